import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { AIProbe, GitHubProbe, JenkinsProbe, Probes } from "../probes/types.js";
import { decryptSecret, encryptSecret } from "./cipher.js";
import { RestoreFormatError, ValidationError } from "./errors.js";
import { KeyManager } from "./key-manager.js";
import { getDefaultConfig } from "../config/testsift.config.js";
import { encryptLegacySecret } from "./legacy-cipher.fixture.js";
import { createDefaultDocument } from "./schema.js";
import { SettingsService, createSettingsService } from "./service.js";
import { SettingsStore } from "./store.js";
import { BACKUP_FORMAT, type CipherBlob, type SettingsDocument } from "./types.js";

const VALID_AI_KEY = `AIzaSy${"x".repeat(33)}`;
const NOW = "2025-03-01T12:00:00.000Z";

describe("SettingsService", () => {
  let dir: string;
  let settingsPath: string;
  let keys: KeyManager;
  let store: SettingsStore;
  let jenkinsProbe: Mock<JenkinsProbe["probe"]>;
  let githubProbe: Mock<GitHubProbe["probe"]>;
  let aiProbe: Mock<AIProbe["probe"]>;
  let aiListModels: Mock<AIProbe["listModels"]>;

  function createService(timeoutMs = 1000): SettingsService {
    const probes: Probes = {
      jenkins: { probe: jenkinsProbe },
      github: { probe: githubProbe },
      ai: { probe: aiProbe, listModels: aiListModels }
    };
    return new SettingsService({ store, keys, probes, timeoutMs, now: () => new Date(NOW) });
  }

  async function decryptStored(blob: CipherBlob | null): Promise<string> {
    const key = await keys.loadKey();
    if (!key || !blob) {
      throw new Error("nothing to decrypt");
    }
    return decryptSecret(blob, key);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "testsift-service-"));
    settingsPath = path.join(dir, "settings.json");
    keys = new KeyManager(path.join(dir, "settings.key"));
    store = new SettingsStore({ settingsPath, backupDir: path.join(dir, "backups") });
    jenkinsProbe = vi.fn<JenkinsProbe["probe"]>(async () => ({ ok: true, detail: "Connected to Jenkins 2.440" }));
    githubProbe = vi.fn<GitHubProbe["probe"]>(async () => ({ ok: true, detail: "Authenticated as ci-bot" }));
    aiProbe = vi.fn<AIProbe["probe"]>(async () => ({ ok: true, detail: "Model Gemini 2.5 Pro is available" }));
    aiListModels = vi.fn<AIProbe["listModels"]>(async () => []);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("reading and updating", () => {
    it("starts from defaults with no secrets", async () => {
      const settings = await createService().getSettings();

      expect(settings.jenkins.api_token).toBeNull();
      expect(settings.ai.model).toBe("gemini-2.5-pro");
      expect(settings.last_updated).toBeNull();
    });

    it("stores the AI key encrypted and shows it masked", async () => {
      const service = createService();

      const updated = await service.updateSettings({
        ai: { api_key: VALID_AI_KEY, model: "gemini-1.5-pro", temperature: 0.7, max_tokens: 4096 }
      });

      expect(updated.ai.api_key).toBe("********");
      expect((await service.secretsStatus()).ai.api_key).toBe(true);
      expect((await service.getSettings()).ai).toEqual({
        api_key: "********",
        model: "gemini-1.5-pro",
        temperature: 0.7,
        max_tokens: 4096
      });
      expect(fs.readFileSync(settingsPath, "utf-8")).not.toContain(VALID_AI_KEY);
      expect(await decryptStored((await store.load()).ai.api_key)).toBe(VALID_AI_KEY);
    });

    it("stamps last_updated", async () => {
      const updated = await createService().updateSettings({ preferences: { theme: "dark" } });

      expect(updated.last_updated).toBe(NOW);
    });

    it("keeps a stored secret when a later update omits or blanks it", async () => {
      const service = createService();
      await service.updateSettings({
        jenkins: { url: "https://ci.example.com", username: "ci-bot", api_token: "test-secret" }
      });
      const before = (await store.load()).jenkins.api_token;

      await service.updateSettings({ jenkins: { verify_ssl: false } });
      await service.updateSettings({ jenkins: { api_token: "   " } });

      const after = await store.load();
      expect(after.jenkins.api_token).toBe(before);
      expect(after.jenkins.verify_ssl).toBe(false);
      expect(await decryptStored(after.jenkins.api_token)).toBe("test-secret");
    });

    it("changes only the supplied non-secret field", async () => {
      const service = createService();
      await service.updateSettings({
        jenkins: { url: "https://ci.example.com", username: "ci-bot", api_token: "test-secret" },
        github: { token: "test-github-token" }
      });
      const before = await store.load();

      await service.updateSettings({ ai: { temperature: 1.2 } });

      const after = await store.load();
      expect(after.ai.temperature).toBe(1.2);
      expect(after.ai.model).toBe(before.ai.model);
      expect(after.jenkins).toEqual(before.jenkins);
      expect(after.github).toEqual(before.github);
    });

    it("rejects invalid input before anything is written", async () => {
      const service = createService();

      const error = await service.updateSettings({ ai: { temperature: 5.0 } }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ fieldErrors: { "ai.temperature": ["Temperature must be between 0.0 and 2.0"] } });
      expect(fs.existsSync(settingsPath)).toBe(false);
      expect((await service.getSettings()).ai.temperature).toBe(0.7);
    });

    it("does not put rejected secrets in the error", async () => {
      const error = await createService()
        .updateSettings({ github: { token: "tiny-tok" } })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(JSON.stringify(error)).not.toContain("tiny-tok");
      expect(error).toMatchObject({ message: "Settings validation failed: github.token" });
    });

    it("keeps both of two concurrent disjoint updates", async () => {
      const service = createService();

      await Promise.all([
        service.updateSettings({
          jenkins: { url: "https://ci.example.com", username: "ci-bot", api_token: "test-secret" }
        }),
        service.updateSettings({ ai: { max_tokens: 2048 } })
      ]);

      const doc = await store.load();
      expect(doc.jenkins.url).toBe("https://ci.example.com");
      expect(doc.ai.max_tokens).toBe(2048);
    });

    it("warns when the Jenkins URL is plain HTTP", async () => {
      await createService().updateSettings({
        jenkins: { url: "http://ci.internal:8080", username: "ci-bot", api_token: "test-secret" }
      });

      expect(console.warn).toHaveBeenCalledWith(
        "[settings] Jenkins URL uses plain HTTP; credentials will be sent unencrypted"
      );
    });

    it("does not create a key when no secret is supplied", async () => {
      await createService().updateSettings({ preferences: { results_per_page: 50 } });

      expect(fs.existsSync(path.join(dir, "settings.key"))).toBe(false);
    });
  });

  describe("parseSettingsUpdate", () => {
    it("passes a well-formed update through", () => {
      expect(createService().parseSettingsUpdate({ github: { token: "test-secret" } })).toEqual({
        github: { token: "test-secret" }
      });
    });

    it("reports type errors by field", () => {
      const service = createService();

      expect(() => service.parseSettingsUpdate({ ai: { temperature: "hot" } })).toThrow(
        "Settings validation failed: ai.temperature"
      );
      expect(() => service.parseSettingsUpdate({ extra: true })).toThrow("Settings validation failed: (root)");
    });
  });

  describe("validateCurrent", () => {
    it("reports problems in the stored document", async () => {
      const doc: SettingsDocument = {
        ...createDefaultDocument(),
        jenkins: { url: "https://ci.example.com", username: null, api_token: null, verify_ssl: true }
      };
      await store.save(doc);

      expect(await createService().validateCurrent()).toEqual({
        "jenkins.username": ["Jenkins username is required when URL is provided"],
        "jenkins.api_token": ["Jenkins API token is required when URL is provided"]
      });
    });
  });

  describe("testConnection", () => {
    it("probes Jenkins with the decrypted stored credentials", async () => {
      const service = createService();
      await service.updateSettings({
        jenkins: { url: "https://ci.example.com", username: "ci-bot", api_token: "test-secret", verify_ssl: false }
      });

      const result = await service.testConnection("jenkins");

      expect(result).toEqual({
        service: "jenkins",
        success: true,
        message: "Jenkins connection successful: Connected to Jenkins 2.440"
      });
      expect(jenkinsProbe).toHaveBeenCalledWith(
        { url: "https://ci.example.com", username: "ci-bot", token: "test-secret", verifySsl: false },
        expect.any(AbortSignal)
      );
    });

    it("uses override values without saving them", async () => {
      const service = createService();
      await service.updateSettings({ github: { token: "test-github-token" } });

      await service.testConnection("github", { token: "override-token" });

      expect(githubProbe).toHaveBeenCalledWith("override-token", expect.any(AbortSignal));
      expect(await decryptStored((await store.load()).github.token)).toBe("test-github-token");
    });

    it("falls back to the stored secret when the override is blank", async () => {
      const service = createService();
      await service.updateSettings({ ai: { api_key: VALID_AI_KEY } });

      await service.testConnection("ai", { api_key: "  ", model: "gemini-2.5-flash" });

      expect(aiProbe).toHaveBeenCalledWith(VALID_AI_KEY, "gemini-2.5-flash", expect.any(AbortSignal));
    });

    it("reports missing credentials as misconfigured", async () => {
      const result = await createService().testConnection("jenkins");

      expect(result).toEqual({
        service: "jenkins",
        success: false,
        message: "Jenkins is not configured: missing url, username, api_token",
        error_details: "Provide url, username and api_token in settings or as overrides",
        failure_kind: "misconfigured"
      });
      expect(jenkinsProbe).not.toHaveBeenCalled();
    });

    it("reports a malformed override URL as misconfigured", async () => {
      const result = await createService().testConnection("jenkins", {
        url: "javascript:alert(1)",
        username: "ci-bot",
        api_token: "test-secret"
      });

      expect(result.failure_kind).toBe("misconfigured");
      expect(result.error_details).toBe("URL contains potentially dangerous content: javascript:");
    });

    it("classifies rejected credentials as auth failures and scrubs the secret", async () => {
      githubProbe.mockResolvedValue({ ok: false, reason: "auth", detail: "token test-github-token is revoked" });

      const result = await createService().testConnection("github", { token: "test-github-token" });

      expect(result).toEqual({
        service: "github",
        success: false,
        message: "GitHub authentication failed",
        error_details: "token ******** is revoked",
        failure_kind: "auth"
      });
    });

    it("turns a thrown probe error into a network failure", async () => {
      githubProbe.mockRejectedValue(new Error("socket hang up while sending test-github-token"));

      const result = await createService().testConnection("github", { token: "test-github-token" });

      expect(result.failure_kind).toBe("network");
      expect(result.error_details).toBe("socket hang up while sending ********");
    });

    it("reports an unexpected service answer", async () => {
      aiProbe.mockResolvedValue({ ok: false, reason: "unexpected", detail: "Model not found" });

      const result = await createService().testConnection("ai", { api_key: VALID_AI_KEY });

      expect(result).toMatchObject({
        success: false,
        message: "AI service returned an unexpected response",
        failure_kind: "unexpected"
      });
    });

    it("times out a probe that never answers", async () => {
      let aborted = false;
      jenkinsProbe.mockImplementation(
        (_target, signal) =>
          new Promise(() => {
            signal.addEventListener("abort", () => {
              aborted = true;
            });
          })
      );

      const result = await createService(20).testConnection("jenkins", {
        url: "https://ci.example.com",
        username: "ci-bot",
        api_token: "test-secret"
      });

      expect(result).toEqual({
        service: "jenkins",
        success: false,
        message: "Jenkins did not respond within 20ms",
        error_details: "Timed out after 20ms",
        failure_kind: "timeout"
      });
      expect(aborted).toBe(true);
    });

    it("rejects unknown services", async () => {
      const result = await createService().testConnection("gitlab");

      expect(result).toEqual({
        service: "gitlab",
        success: false,
        message: "Unknown service: gitlab",
        error_details: "Expected one of: jenkins, github, ai",
        failure_kind: "unsupported"
      });
    });

    it("reports a secret sealed with another key as an integrity failure", async () => {
      await keys.getOrCreateKey();
      await store.save({ ...createDefaultDocument(), github: { token: encryptSecret("test-secret", Buffer.alloc(32, 1)) } });

      const result = await createService().testConnection("github");

      expect(result).toMatchObject({
        success: false,
        message: "Stored secret could not be decrypted",
        error_details: "Encrypted secret failed authentication (wrong key or tampered data)",
        failure_kind: "integrity"
      });
      expect(githubProbe).not.toHaveBeenCalled();
    });

    it("does not invent a key to decrypt with", async () => {
      await store.save({ ...createDefaultDocument(), github: { token: encryptSecret("test-secret", Buffer.alloc(32, 1)) } });

      const result = await createService().testConnection("github");

      expect(result.failure_kind).toBe("integrity");
      expect(result.error_details).toBe("No encryption key is available to decrypt stored secrets");
      expect(fs.existsSync(path.join(dir, "settings.key"))).toBe(false);
    });

    it("reports an unreadable settings file as an integrity failure", async () => {
      fs.writeFileSync(settingsPath, "{");

      const result = await createService().testConnection("github", { token: "test-github-token" });

      expect(result.failure_kind).toBe("integrity");
      expect(result.message).toBe("Stored settings could not be read");
    });
  });

  describe("listModels", () => {
    it("needs a key", async () => {
      expect(await createService().listModels()).toEqual({
        success: false,
        models: [],
        total_count: 0,
        message: "AI service is not configured",
        error_details: "No API key is stored or supplied"
      });
    });

    it("lists models with the stored key", async () => {
      aiListModels.mockResolvedValue([
        { name: "gemini-2.5-pro", display_name: "Gemini 2.5 Pro", supported_actions: ["generateContent"] }
      ]);
      const service = createService();
      await service.updateSettings({ ai: { api_key: VALID_AI_KEY } });

      const result = await service.listModels();

      expect(result.success).toBe(true);
      expect(result.total_count).toBe(1);
      expect(result.message).toBe("Fetched 1 models");
      expect(aiListModels).toHaveBeenCalledWith(VALID_AI_KEY, expect.any(AbortSignal));
    });

    it("scrubs the key from failures", async () => {
      aiListModels.mockRejectedValue(new Error(`key ${VALID_AI_KEY} not valid`));

      const result = await createService().listModels(VALID_AI_KEY);

      expect(result).toEqual({
        success: false,
        models: [],
        total_count: 0,
        message: "Failed to fetch models",
        error_details: "key ******** not valid"
      });
    });
  });

  describe("backup and restore", () => {
    it("restores a backup to the same decrypted values", async () => {
      const service = createService();
      await service.updateSettings({
        jenkins: { url: "https://ci.example.com", username: "ci-bot", api_token: "test-secret" },
        github: { token: "test-github-token" },
        ai: { api_key: VALID_AI_KEY }
      });
      const snapshot = await service.backup();

      await service.updateSettings({ github: { token: "replaced-github-token" }, preferences: { theme: "light" } });
      const restored = await service.restore(snapshot);

      const doc = await store.load();
      expect(restored.github.token).toBe("********");
      expect(doc).toEqual(snapshot.settings);
      expect(await decryptStored(doc.jenkins.api_token)).toBe("test-secret");
      expect(await decryptStored(doc.github.token)).toBe("test-github-token");
      expect(await decryptStored(doc.ai.api_key)).toBe(VALID_AI_KEY);
    });

    it("builds a backup envelope", async () => {
      const snapshot = await createService().backup();

      expect(snapshot).toEqual({
        format: BACKUP_FORMAT,
        schema_version: 2,
        created_at: NOW,
        settings: createDefaultDocument()
      });
    });

    it("writes backups to the backup directory and restores from a file", async () => {
      const service = createService();
      await service.updateSettings({ preferences: { language: "de" } });

      const backupPath = await service.saveBackup();
      await service.updateSettings({ preferences: { language: "fr" } });
      await service.restoreFromFile(backupPath);

      expect(backupPath).toBe(path.join(dir, "backups", "settings_backup_20250301_120000_000.json"));
      expect(await service.listBackups()).toEqual([backupPath]);
      expect((await service.getSettings()).preferences.language).toBe("de");
    });

    it("accepts a backup given as JSON text", async () => {
      const service = createService();
      const snapshot = { ...(await service.backup()), settings: { ...createDefaultDocument(), preferences: { ...createDefaultDocument().preferences, theme: "dark" } } };

      const restored = await service.restore(JSON.stringify(snapshot));

      expect(restored.preferences.theme).toBe("dark");
    });

    it("rejects backups without a schema_version", async () => {
      await expect(createService().restore({ format: BACKUP_FORMAT, settings: {} })).rejects.toThrow(
        "Backup has no schema_version"
      );
    });

    it("rejects backups from a newer release", async () => {
      await expect(
        createService().restore({ format: BACKUP_FORMAT, schema_version: 3, settings: {} })
      ).rejects.toThrow("Backup schema_version 3 is newer than this release supports (2)");
    });

    it("rejects input that is not a backup", async () => {
      const service = createService();

      await expect(service.restore("not json")).rejects.toBeInstanceOf(RestoreFormatError);
      await expect(service.restore({ schema_version: 2, settings: {} })).rejects.toThrow(
        'Backup format marker must be "testsift-settings-backup"'
      );
      await expect(
        service.restore({ format: BACKUP_FORMAT, schema_version: 2, settings: { ai: { temperature: "hot" } } })
      ).rejects.toThrow("Backup settings have an invalid shape");
    });

    it("rejects secrets sealed with another installation's key and leaves settings alone", async () => {
      const service = createService();
      await service.updateSettings({ github: { token: "test-github-token" } });
      const before = fs.readFileSync(settingsPath, "utf-8");
      const foreign = {
        format: BACKUP_FORMAT,
        schema_version: 2,
        created_at: NOW,
        settings: { ...createDefaultDocument(), github: { token: encryptSecret("test-secret", Buffer.alloc(32, 1)) } }
      };

      await expect(service.restore(foreign)).rejects.toThrow(
        "Backup secret github.token cannot be decrypted with this installation's key"
      );
      expect(fs.readFileSync(settingsPath, "utf-8")).toBe(before);
    });

    it("upgrades version 1 backups", async () => {
      const restored = await createService().restore({
        format: BACKUP_FORMAT,
        schema_version: 1,
        settings: { ai: { gemini_api_key: VALID_AI_KEY, model: "gemini-1.5-pro", temperature: 0.7, max_tokens: 4096 } }
      });

      expect(restored.ai).toEqual({ api_key: "********", model: "gemini-1.5-pro", temperature: 0.7, max_tokens: 4096 });
      expect(await decryptStored((await store.load()).ai.api_key)).toBe(VALID_AI_KEY);
    });
  });

  describe("resetToDefaults", () => {
    it("backs up the current settings before resetting", async () => {
      const service = createService();
      await service.updateSettings({ github: { token: "test-github-token" } });
      const token = (await store.load()).github.token;

      const reset = await service.resetToDefaults();

      expect(reset).toEqual(createDefaultDocument(NOW));
      const [backupPath] = await service.listBackups();
      const saved: unknown = JSON.parse(fs.readFileSync(backupPath, "utf-8"));
      expect(saved).toMatchObject({ format: BACKUP_FORMAT, settings: { github: { token } } });
    });

    it("still resets when the stored file is corrupt", async () => {
      fs.writeFileSync(settingsPath, "{");

      await createService().resetToDefaults();

      const copyPath = path.join(dir, "backups", "settings_unreadable_20250301_120000_000.json");
      expect(await store.load()).toEqual(createDefaultDocument(NOW));
      expect(fs.readFileSync(copyPath, "utf-8")).toBe("{");
      expect(console.warn).toHaveBeenCalledWith(
        `[settings] Current settings are unreadable; copied them to ${copyPath} before reset`
      );
    });

    it("keeps a copy of a document from a newer release before resetting", async () => {
      const future = JSON.stringify({ schema_version: 3, new_section: { x: 1 } });
      fs.writeFileSync(settingsPath, future);

      await createService().resetToDefaults();

      const backupDir = path.join(dir, "backups");
      expect(fs.readdirSync(backupDir)).toEqual(["settings_unreadable_20250301_120000_000.json"]);
      expect(fs.readFileSync(path.join(backupDir, "settings_unreadable_20250301_120000_000.json"), "utf-8")).toBe(future);
      expect((await store.load()).schema_version).toBe(2);
    });

    it("does not overwrite a backup taken in the same millisecond", async () => {
      const service = createService();
      await service.updateSettings({ github: { token: "test-github-token" } });
      const manual = await service.saveBackup();

      await service.resetToDefaults();

      const backups = await service.listBackups();
      expect(backups).toHaveLength(2);
      expect(backups).toContain(manual);
    });
  });

  describe("status", () => {
    it("reports configured services", async () => {
      const service = createService();
      await service.updateSettings({ github: { token: "test-github-token" } });

      const status = await service.serviceStatus();

      expect(status.github.configured).toBe(true);
      expect(status.jenkins.configured).toBe(false);
    });
  });

  describe("upgrading version 1 files on read", () => {
    function createWiredService(): SettingsService {
      return createSettingsService(getDefaultConfig(), {
        baseDir: dir,
        legacyPassword: "test-secret",
        probes: { github: { probe: githubProbe } },
        now: () => new Date(NOW)
      });
    }

    function writeLegacySettings(content: object): void {
      fs.mkdirSync(path.join(dir, "data"), { recursive: true });
      fs.writeFileSync(path.join(dir, "data", "settings.json"), JSON.stringify(content));
    }

    it("creates no key when the file holds no secrets", async () => {
      writeLegacySettings({ preferences: { theme: "dark" } });

      const current = await createWiredService().getSettings();

      expect(current.preferences.theme).toBe("dark");
      expect(fs.existsSync(path.join(dir, "data", "settings.key"))).toBe(false);
    });

    it("creates the key on first read to seal legacy secrets", async () => {
      writeLegacySettings({ github: { token: encryptLegacySecret("legacy-github-token", "test-secret") } });
      const service = createWiredService();

      expect(await service.secretsStatus()).toEqual({
        jenkins: { api_token: false },
        github: { token: true },
        ai: { api_key: false }
      });
      expect(fs.existsSync(path.join(dir, "data", "settings.key"))).toBe(true);

      const result = await service.testConnection("github");
      expect(result.success).toBe(true);
      expect(githubProbe).toHaveBeenCalledWith("legacy-github-token", expect.any(AbortSignal));
    });
  });
});
