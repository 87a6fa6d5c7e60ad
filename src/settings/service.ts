import { resolveStoragePaths, type TestsiftConfig } from "../config/testsift.config.js";
import { GeminiProbe } from "../probes/ai.js";
import { OctokitGitHubProbe } from "../probes/github.js";
import { HttpJenkinsProbe } from "../probes/jenkins.js";
import { TimeoutError, withTimeout } from "../probes/timeout.js";
import type { ProbeOutcome, Probes } from "../probes/types.js";
import { decryptSecret, encryptSecret } from "./cipher.js";
import {
  DecryptionError,
  KeyCorruptError,
  RestoreFormatError,
  StoreCorruptError,
  ValidationError,
  describeError
} from "./errors.js";
import { KeyManager } from "./key-manager.js";
import { hasFreshSecrets, mergeSettings, sealDraft, toDraft } from "./merge.js";
import { Mutex } from "./mutex.js";
import { redactSettings, scrubSecrets } from "./redaction.js";
import {
  CURRENT_SCHEMA_VERSION,
  SettingsDocumentSchema,
  SettingsUpdateSchema,
  createDefaultDocument,
  isRecord,
  zodIssuesToFieldErrors,
  type SecretSealer
} from "./schema.js";
import { reportSecretStatus, reportServiceStatus } from "./status.js";
import { legacyPasswordFromEnv } from "./legacy-cipher.js";
import { SettingsStore } from "./store.js";
import {
  BACKUP_FORMAT,
  type CipherBlob,
  type ConnectionFailureKind,
  type ConnectionOverride,
  type ConnectionTestResult,
  type FieldErrors,
  type ModelListResult,
  type RedactedSettings,
  type SecretStatus,
  type ServiceName,
  type ServiceStatus,
  type SettingsBackup,
  type SettingsDocument,
  type SettingsDraft,
  type SettingsUpdate
} from "./types.js";
import { checkJenkinsUrl, isPlainHttpUrl, validateSettings } from "./validation.js";

export const DEFAULT_CONNECTION_TIMEOUT_MS = 10000;

const SERVICE_LABELS: Record<ServiceName, string> = {
  jenkins: "Jenkins",
  github: "GitHub",
  ai: "AI service"
};

export interface SettingsServiceOptions {
  store: SettingsStore;
  keys: KeyManager;
  probes: Probes;
  timeoutMs?: number;
  now?: () => Date;
}

/**
 * Entry point for reading, changing and checking settings.
 *
 * Mutations (update, reset, restore) run one at a time behind an in-process
 * lock. Reads take no lock: the store replaces its file atomically, so a read
 * sees either the previous or the next document.
 */
export class SettingsService {
  readonly store: SettingsStore;
  private readonly keys: KeyManager;
  private readonly probes: Probes;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly mutex = new Mutex();

  constructor(options: SettingsServiceOptions) {
    this.store = options.store;
    this.keys = options.keys;
    this.probes = options.probes;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  async getSettings(): Promise<RedactedSettings> {
    return redactSettings(await this.store.load());
  }

  /**
   * Shape-check an update that arrived as untyped data.
   */
  parseSettingsUpdate(raw: unknown): SettingsUpdate {
    const result = SettingsUpdateSchema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError(zodIssuesToFieldErrors(result.error));
    }
    return result.data;
  }

  async updateSettings(update: SettingsUpdate): Promise<RedactedSettings> {
    return this.mutex.runExclusive(async () => {
      const current = await this.store.load();
      const draft = mergeSettings(current, update);

      const fieldErrors = validateSettings(draft);
      if (hasErrors(fieldErrors)) {
        throw new ValidationError(fieldErrors);
      }
      if (update.jenkins?.url !== undefined && isPlainHttpUrl(draft.jenkins.url)) {
        console.warn("[settings] Jenkins URL uses plain HTTP; credentials will be sent unencrypted");
      }

      const seal = await this.sealerFor(draft);
      const next = sealDraft(draft, seal, this.now().toISOString());
      await this.store.save(next);
      return redactSettings(next);
    });
  }

  /**
   * Back up the current document, then replace it with defaults.
   */
  async resetToDefaults(): Promise<RedactedSettings> {
    return this.mutex.runExclusive(async () => {
      try {
        const current = await this.store.load();
        const backupPath = await this.store.writeBackup(this.buildBackup(current));
        console.log(`[settings] Backed up settings to ${backupPath} before reset`);
      } catch (error) {
        if (!(error instanceof StoreCorruptError)) {
          throw error;
        }
        const copyPath = await this.store.preserveUnreadable(this.now());
        console.warn(
          copyPath
            ? `[settings] Current settings are unreadable; copied them to ${copyPath} before reset`
            : "[settings] Current settings are unreadable; resetting without a backup"
        );
      }

      const defaults = createDefaultDocument(this.now().toISOString());
      await this.store.save(defaults);
      return redactSettings(defaults);
    });
  }

  validateSettings(draft: SettingsDraft): FieldErrors {
    return validateSettings(draft);
  }

  async validateCurrent(): Promise<FieldErrors> {
    return validateSettings(toDraft(await this.store.load()));
  }

  /**
   * Probe one external service. Override values take precedence; secrets
   * left blank in the override fall back to the stored ones. Never throws.
   */
  async testConnection(service: string, override: ConnectionOverride = {}): Promise<ConnectionTestResult> {
    if (!isServiceName(service)) {
      return failure(service, "unsupported", `Unknown service: ${service}`, "Expected one of: jenkins, github, ai");
    }

    let doc: SettingsDocument;
    try {
      doc = await this.store.load();
    } catch (error) {
      return failure(service, "integrity", "Stored settings could not be read", describeError(error));
    }

    try {
      switch (service) {
        case "jenkins":
          return await this.testJenkins(doc, override);
        case "github":
          return await this.testGitHub(doc, override);
        case "ai":
          return await this.testAI(doc, override);
      }
    } catch (error) {
      if (error instanceof DecryptionError || error instanceof KeyCorruptError) {
        return failure(service, "integrity", "Stored secret could not be decrypted", error.message);
      }
      return failure(service, "unexpected", `${SERVICE_LABELS[service]} connection test failed`, describeError(error));
    }
  }

  async listModels(apiKeyOverride?: string | null): Promise<ModelListResult> {
    let apiKey: string | null;
    try {
      const doc = await this.store.load();
      apiKey = nonBlank(apiKeyOverride) ?? (await this.decryptStored(doc.ai.api_key));
    } catch (error) {
      return { success: false, models: [], total_count: 0, message: "API key could not be read", error_details: describeError(error) };
    }
    if (!apiKey) {
      return {
        success: false,
        models: [],
        total_count: 0,
        message: "AI service is not configured",
        error_details: "No API key is stored or supplied"
      };
    }

    const key = apiKey;
    try {
      const models = await withTimeout(signal => this.probes.ai.listModels(key, signal), this.timeoutMs);
      return { success: true, models, total_count: models.length, message: `Fetched ${models.length} models` };
    } catch (error) {
      const message = error instanceof TimeoutError ? "Model listing timed out" : "Failed to fetch models";
      return {
        success: false,
        models: [],
        total_count: 0,
        message,
        error_details: scrubSecrets(describeError(error), [key])
      };
    }
  }

  /**
   * Snapshot of the stored document. Secrets stay encrypted with this
   * installation's key.
   */
  async backup(): Promise<SettingsBackup> {
    return this.buildBackup(await this.store.load());
  }

  async saveBackup(): Promise<string> {
    const backupPath = await this.store.writeBackup(await this.backup());
    console.log(`[settings] Wrote backup ${backupPath}`);
    return backupPath;
  }

  async listBackups(): Promise<string[]> {
    return this.store.listBackups();
  }

  /**
   * Replace the whole document with a backup, given as an object or as its
   * JSON text.
   */
  async restore(input: unknown): Promise<RedactedSettings> {
    const doc = await this.readBackupDocument(typeof input === "string" ? parseBackupJson(input) : input);

    await this.assertSecretsDecrypt(doc);

    const fieldErrors = validateSettings(toDraft(doc));
    if (hasErrors(fieldErrors)) {
      throw new ValidationError(fieldErrors);
    }

    return this.mutex.runExclusive(async () => {
      await this.store.save(doc);
      console.log("[settings] Restored settings from backup");
      return redactSettings(doc);
    });
  }

  async restoreFromFile(filePath: string): Promise<RedactedSettings> {
    return this.restore(await this.store.readBackup(filePath));
  }

  async secretsStatus(): Promise<SecretStatus> {
    return reportSecretStatus(await this.store.load());
  }

  async serviceStatus(): Promise<ServiceStatus> {
    return reportServiceStatus(await this.store.load());
  }

  private buildBackup(doc: SettingsDocument): SettingsBackup {
    return {
      format: BACKUP_FORMAT,
      schema_version: doc.schema_version,
      created_at: this.now().toISOString(),
      settings: doc
    };
  }

  private async sealerFor(draft: SettingsDraft): Promise<(plaintext: string) => CipherBlob> {
    if (!hasFreshSecrets(draft)) {
      return () => {
        throw new Error("No new secrets to encrypt");
      };
    }
    const key = await this.keys.getOrCreateKey();
    return plaintext => encryptSecret(plaintext, key);
  }

  private readonly sealLegacySecret: SecretSealer = async plaintext =>
    encryptSecret(plaintext, await this.keys.getOrCreateKey());

  private async decryptStored(blob: CipherBlob | null): Promise<string | null> {
    if (!blob) {
      return null;
    }
    const key = await this.keys.loadKey();
    if (!key) {
      throw new DecryptionError("No encryption key is available to decrypt stored secrets");
    }
    return decryptSecret(blob, key);
  }

  private async readBackupDocument(raw: unknown): Promise<SettingsDocument> {
    if (!isRecord(raw)) {
      throw new RestoreFormatError("Backup must be a JSON object");
    }
    if (raw.format !== BACKUP_FORMAT) {
      throw new RestoreFormatError(`Backup format marker must be "${BACKUP_FORMAT}"`);
    }

    const version = raw.schema_version;
    if (version === undefined) {
      throw new RestoreFormatError("Backup has no schema_version");
    }
    if (typeof version !== "number" || !Number.isInteger(version) || version < 1) {
      throw new RestoreFormatError("Backup has an invalid schema_version");
    }
    if (version > CURRENT_SCHEMA_VERSION) {
      throw new RestoreFormatError(
        `Backup schema_version ${version} is newer than this release supports (${CURRENT_SCHEMA_VERSION})`
      );
    }
    if (!isRecord(raw.settings)) {
      throw new RestoreFormatError("Backup has no settings object");
    }

    let upgraded: Record<string, unknown>;
    try {
      upgraded = await this.store.upgrade({ ...raw.settings, schema_version: version }, "backup", this.sealLegacySecret);
    } catch (error) {
      throw new RestoreFormatError(`Backup could not be upgraded: ${describeError(error)}`);
    }

    const result = SettingsDocumentSchema.safeParse(upgraded);
    if (!result.success) {
      throw new RestoreFormatError("Backup settings have an invalid shape", zodIssuesToFieldErrors(result.error));
    }
    return result.data;
  }

  private async assertSecretsDecrypt(doc: SettingsDocument): Promise<void> {
    const secrets: Array<[string, CipherBlob | null]> = [
      ["jenkins.api_token", doc.jenkins.api_token],
      ["github.token", doc.github.token],
      ["ai.api_key", doc.ai.api_key]
    ];

    for (const [field, blob] of secrets) {
      if (!blob) continue;
      try {
        await this.decryptStored(blob);
      } catch (error) {
        if (error instanceof DecryptionError) {
          throw new RestoreFormatError(`Backup secret ${field} cannot be decrypted with this installation's key`, {
            [field]: [error.message]
          });
        }
        throw error;
      }
    }
  }

  private async testJenkins(doc: SettingsDocument, override: ConnectionOverride): Promise<ConnectionTestResult> {
    const url = nonBlank(override.url) ?? doc.jenkins.url;
    const username = nonBlank(override.username) ?? doc.jenkins.username;
    const token = nonBlank(override.api_token) ?? (await this.decryptStored(doc.jenkins.api_token));
    const verifySsl = override.verify_ssl ?? doc.jenkins.verify_ssl;

    if (!url || !username || !token) {
      const missing: string[] = [];
      if (!url) missing.push("url");
      if (!username) missing.push("username");
      if (!token) missing.push("api_token");
      return failure(
        "jenkins",
        "misconfigured",
        `Jenkins is not configured: missing ${missing.join(", ")}`,
        "Provide url, username and api_token in settings or as overrides"
      );
    }

    const urlProblems = checkJenkinsUrl(url);
    if (urlProblems.length > 0) {
      return failure("jenkins", "misconfigured", "Jenkins URL is invalid", urlProblems.join("; "));
    }

    return this.runProbe("jenkins", [token], signal =>
      this.probes.jenkins.probe({ url, username, token, verifySsl }, signal)
    );
  }

  private async testGitHub(doc: SettingsDocument, override: ConnectionOverride): Promise<ConnectionTestResult> {
    const token = nonBlank(override.token) ?? (await this.decryptStored(doc.github.token));
    if (!token) {
      return failure("github", "misconfigured", "GitHub is not configured: missing token", "Provide a token in settings or as an override");
    }
    return this.runProbe("github", [token], signal => this.probes.github.probe(token, signal));
  }

  private async testAI(doc: SettingsDocument, override: ConnectionOverride): Promise<ConnectionTestResult> {
    const apiKey = nonBlank(override.api_key) ?? (await this.decryptStored(doc.ai.api_key));
    const model = nonBlank(override.model) ?? doc.ai.model;
    if (!apiKey) {
      return failure("ai", "misconfigured", "AI service is not configured: missing api_key", "Provide an API key in settings or as an override");
    }
    return this.runProbe("ai", [apiKey], signal => this.probes.ai.probe(apiKey, model, signal));
  }

  private async runProbe(
    service: ServiceName,
    secrets: string[],
    task: (signal: AbortSignal) => Promise<ProbeOutcome>
  ): Promise<ConnectionTestResult> {
    const label = SERVICE_LABELS[service];

    let outcome: ProbeOutcome;
    try {
      outcome = await withTimeout(task, this.timeoutMs);
    } catch (error) {
      if (error instanceof TimeoutError) {
        return failure(service, "timeout", `${label} did not respond within ${this.timeoutMs}ms`, error.message);
      }
      return failure(service, "network", `Could not connect to ${label}`, scrubSecrets(describeError(error), secrets));
    }

    const detail = scrubSecrets(outcome.detail, secrets);
    if (outcome.ok) {
      return { service, success: true, message: `${label} connection successful: ${detail}` };
    }
    switch (outcome.reason) {
      case "auth":
        return failure(service, "auth", `${label} authentication failed`, detail);
      case "network":
        return failure(service, "network", `Could not connect to ${label}`, detail);
      case "unexpected":
        return failure(service, "unexpected", `${label} returned an unexpected response`, detail);
    }
  }
}

export interface CreateSettingsServiceOptions {
  baseDir?: string;
  probes?: Partial<Probes>;
  now?: () => Date;
  /** Defaults to SETTINGS_ENCRYPTION_KEY. */
  legacyPassword?: string;
}

/**
 * Wire a service from configuration: file locations, key manager and the
 * default probes.
 */
export function createSettingsService(config: TestsiftConfig, options: CreateSettingsServiceOptions = {}): SettingsService {
  const paths = resolveStoragePaths(config.storage, options.baseDir);
  const keys = new KeyManager(paths.keyPath);
  const store = new SettingsStore({
    settingsPath: paths.settingsPath,
    backupDir: paths.backupDir,
    sealLegacySecret: async plaintext => encryptSecret(plaintext, await keys.getOrCreateKey()),
    legacyPassword: options.legacyPassword ?? legacyPasswordFromEnv()
  });

  const probes: Probes = {
    jenkins: options.probes?.jenkins ?? new HttpJenkinsProbe(),
    github: options.probes?.github ?? new OctokitGitHubProbe({ baseUrl: config.connections.github_api_url }),
    ai: options.probes?.ai ?? new GeminiProbe()
  };

  return new SettingsService({ store, keys, probes, timeoutMs: config.connections.timeout_ms, now: options.now });
}

export function isServiceName(value: string): value is ServiceName {
  return value === "jenkins" || value === "github" || value === "ai";
}

function failure(
  service: string,
  kind: ConnectionFailureKind,
  message: string,
  errorDetails: string
): ConnectionTestResult {
  return { service, success: false, message, error_details: errorDetails, failure_kind: kind };
}

function nonBlank(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function hasErrors(fieldErrors: FieldErrors): boolean {
  return Object.keys(fieldErrors).length > 0;
}

function parseBackupJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new RestoreFormatError(`Backup is not valid JSON: ${describeError(error)}`);
  }
}
