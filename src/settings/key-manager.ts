import { randomBytes, randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { KEY_LENGTH } from "./cipher.js";
import { KeyCorruptError } from "./errors.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Owns the installation's encryption key file.
 *
 * The key is created on first use and never rewritten. Creation goes through a
 * temp file plus hard link, so the key file either does not exist or holds a
 * complete key; a process that loses the first-run race reads the winner's key.
 */
export class KeyManager {
  private cached: Promise<Buffer> | null = null;

  constructor(readonly keyPath: string) {}

  getOrCreateKey(): Promise<Buffer> {
    if (!this.cached) {
      this.cached = this.loadOrCreate();
      this.cached.catch(() => {
        this.cached = null;
      });
    }
    return this.cached;
  }

  /**
   * Load without creating. Returns null when no key exists yet.
   */
  async loadKey(): Promise<Buffer | null> {
    if (this.cached) {
      return this.cached;
    }
    const key = await this.readKeyFile();
    if (key) {
      this.cached = Promise.resolve(key);
    }
    return key;
  }

  private async loadOrCreate(): Promise<Buffer> {
    const existing = await this.readKeyFile();
    if (existing) {
      return existing;
    }

    const dir = path.dirname(this.keyPath);
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });

    const key = randomBytes(KEY_LENGTH);
    const tmpPath = path.join(dir, `.${path.basename(this.keyPath)}.${process.pid}.${randomUUID()}.tmp`);
    await fs.writeFile(tmpPath, `${key.toString("base64")}\n`, { encoding: "utf-8", mode: 0o600, flag: "wx" });

    try {
      await fs.link(tmpPath, this.keyPath);
      console.log(`[keys] Created encryption key at ${this.keyPath}`);
      return key;
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        const winner = await this.readKeyFile();
        if (winner) {
          return winner;
        }
        throw new KeyCorruptError(this.keyPath, `Key file ${this.keyPath} disappeared during creation`);
      }
      throw error;
    } finally {
      await fs.rm(tmpPath, { force: true });
    }
  }

  private async readKeyFile(): Promise<Buffer | null> {
    let content: string;
    try {
      content = await fs.readFile(this.keyPath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    const encoded = content.trim();
    if (!BASE64_PATTERN.test(encoded)) {
      throw new KeyCorruptError(this.keyPath, `Key file ${this.keyPath} is not valid base64`);
    }
    const key = Buffer.from(encoded, "base64");
    if (key.length !== KEY_LENGTH) {
      throw new KeyCorruptError(
        this.keyPath,
        `Key file ${this.keyPath} has unexpected length (expected ${KEY_LENGTH} bytes, got ${key.length})`
      );
    }
    return key;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
