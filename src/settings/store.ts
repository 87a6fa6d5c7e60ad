import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { StoreCorruptError, UnsupportedSchemaVersionError, describeError } from "./errors.js";
import { isErrnoException } from "./key-manager.js";
import {
  CURRENT_SCHEMA_VERSION,
  SettingsDocumentSchema,
  createDefaultDocument,
  isRecord,
  readSchemaVersion,
  upgradeFromV1,
  zodIssuesToFieldErrors,
  type SecretSealer,
  type UpgradeOptions
} from "./schema.js";
import type { SettingsBackup, SettingsDocument } from "./types.js";

export interface SettingsStoreOptions {
  settingsPath: string;
  backupDir: string;
  /** Seals secrets found while upgrading a version 1 file. */
  sealLegacySecret?: SecretSealer;
  /** Password version 1 secrets were encrypted under. */
  legacyPassword?: string;
}

const BACKUP_FILE_PATTERN = /^settings_backup_\d{8}_\d{6}_\d{3}(_\d+)?\.json$/;

/**
 * File-backed settings document. Writes go to a temp file in the same
 * directory and are renamed into place, so readers see the old or the new
 * document, never a partial one.
 */
export class SettingsStore {
  readonly settingsPath: string;
  readonly backupDir: string;
  readonly legacyPassword?: string;
  private readonly sealLegacySecret?: SecretSealer;

  constructor(options: SettingsStoreOptions) {
    this.settingsPath = options.settingsPath;
    this.backupDir = options.backupDir;
    this.sealLegacySecret = options.sealLegacySecret;
    this.legacyPassword = options.legacyPassword;
  }

  async load(): Promise<SettingsDocument> {
    let content: string;
    try {
      content = await fs.readFile(this.settingsPath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return createDefaultDocument();
      }
      throw error;
    }

    try {
      return await this.parse(content);
    } catch (error) {
      if (error instanceof StoreCorruptError) {
        console.error(`[settings] ${error.message}`);
        throw error;
      }
      const corrupt = new StoreCorruptError(
        this.settingsPath,
        `Settings file ${this.settingsPath} could not be read: ${describeError(error)}`,
        { cause: error }
      );
      console.error(`[settings] ${corrupt.message}`);
      throw corrupt;
    }
  }

  async save(doc: SettingsDocument): Promise<void> {
    const result = SettingsDocumentSchema.safeParse(doc);
    if (!result.success) {
      const fields = Object.keys(zodIssuesToFieldErrors(result.error)).join(", ");
      throw new StoreCorruptError(this.settingsPath, `Refusing to save an invalid settings document (${fields})`);
    }
    await writeFileAtomic(this.settingsPath, `${JSON.stringify(result.data, null, 2)}\n`);
  }

  /**
   * Write a backup snapshot and return its path. Never replaces an earlier
   * backup taken in the same millisecond.
   */
  async writeBackup(backup: SettingsBackup): Promise<string> {
    const stem = `settings_backup_${formatBackupTimestamp(new Date(backup.created_at))}`;
    return writeNewFile(this.backupDir, stem, `${JSON.stringify(backup, null, 2)}\n`);
  }

  /**
   * Copy the settings file byte for byte into the backup directory. Used
   * before overwriting a file this release cannot read. Returns null when
   * there is no file.
   */
  async preserveUnreadable(at: Date): Promise<string | null> {
    let content: Buffer;
    try {
      content = await fs.readFile(this.settingsPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
    return writeNewFile(this.backupDir, `settings_unreadable_${formatBackupTimestamp(at)}`, content);
  }

  /**
   * Upgrade a raw document with this store's sealer and legacy password.
   */
  upgrade(raw: Record<string, unknown>, source: string, seal = this.sealLegacySecret): Promise<Record<string, unknown>> {
    return upgradeDocument(raw, source, { seal, legacyPassword: this.legacyPassword });
  }

  /**
   * Backup files in the backup directory, newest first.
   */
  async listBackups(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.backupDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
    return entries
      .filter(name => BACKUP_FILE_PATTERN.test(name))
      .sort()
      .reverse()
      .map(name => path.join(this.backupDir, name));
  }

  async readBackup(filePath: string): Promise<string> {
    return fs.readFile(filePath, "utf-8");
  }

  private async parse(content: string): Promise<SettingsDocument> {
    if (!content.trim()) {
      throw new StoreCorruptError(this.settingsPath, `Settings file ${this.settingsPath} is empty`);
    }

    const raw: unknown = JSON.parse(content);
    if (!isRecord(raw)) {
      throw new StoreCorruptError(this.settingsPath, `Settings file ${this.settingsPath} is not a JSON object`);
    }

    const upgraded = await this.upgrade(raw, this.settingsPath);
    const result = SettingsDocumentSchema.safeParse(upgraded);
    if (!result.success) {
      const fields = Object.keys(zodIssuesToFieldErrors(result.error)).join(", ");
      throw new StoreCorruptError(this.settingsPath, `Settings file ${this.settingsPath} has invalid fields: ${fields}`);
    }
    return result.data;
  }
}

/**
 * Bring a raw document up to the current schema_version. Newer versions are
 * refused rather than parsed, which would drop the fields this release does
 * not know about.
 */
export async function upgradeDocument(
  raw: Record<string, unknown>,
  source: string,
  options: UpgradeOptions = {}
): Promise<Record<string, unknown>> {
  const version = readSchemaVersion(raw);
  if (version === null) {
    throw new StoreCorruptError(source, `${source} has an invalid schema_version`);
  }
  if (version > CURRENT_SCHEMA_VERSION) {
    throw new UnsupportedSchemaVersionError(source, version, CURRENT_SCHEMA_VERSION);
  }

  let upgraded = raw;
  if (version === 1) {
    upgraded = await upgradeFromV1(upgraded, options);
  }
  return upgraded;
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });

  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmpPath, content, { encoding: "utf-8", mode: 0o600 });
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Create `<stem>.json` in dir, or `<stem>_<n>.json` when that name is taken.
 * The file is written in full before it is linked into place.
 */
async function writeNewFile(dir: string, stem: string, content: string | Buffer): Promise<string> {
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });

  const tmpPath = path.join(dir, `.${stem}.${process.pid}.${randomUUID()}.tmp`);
  await fs.writeFile(tmpPath, content, { mode: 0o600, flag: "wx" });
  try {
    for (let attempt = 0; ; attempt++) {
      const filePath = path.join(dir, attempt === 0 ? `${stem}.json` : `${stem}_${attempt}.json`);
      try {
        await fs.link(tmpPath, filePath);
        return filePath;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== "EEXIST") {
          throw error;
        }
      }
    }
  } finally {
    await fs.rm(tmpPath, { force: true });
  }
}

function formatBackupTimestamp(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}_` +
    `${pad(date.getUTCMilliseconds(), 3)}`
  );
}
