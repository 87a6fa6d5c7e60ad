import { createCipheriv, createDecipheriv, randomBytes } from "crypto";
import { DecryptionError } from "./errors.js";
import { CIPHER_BLOB_PREFIX, type CipherBlob } from "./types.js";

const ALGORITHM = "aes-256-gcm";
export const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Presence/format check for a stored secret. Does not decrypt.
 */
export function isCipherBlob(value: unknown): value is CipherBlob {
  if (typeof value !== "string" || !value.startsWith(CIPHER_BLOB_PREFIX)) {
    return false;
  }
  return BASE64URL_PATTERN.test(value.slice(CIPHER_BLOB_PREFIX.length));
}

/**
 * Encrypt a secret with AES-256-GCM. Every call draws a new IV, so the same
 * plaintext never produces the same blob twice.
 *
 * Layout: prefix + base64url(iv ‖ tag ‖ ciphertext)
 */
export function encryptSecret(plaintext: string, key: Buffer): CipherBlob {
  assertKey(key);
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  const tag = cipher.getAuthTag();
  const payload = Buffer.concat([iv, tag, ciphertext]).toString("base64url");
  return `${CIPHER_BLOB_PREFIX}${payload}`;
}

/**
 * Decrypt a blob produced by encryptSecret. Malformed, truncated, tampered or
 * wrong-key input fails the GCM tag check and raises DecryptionError.
 */
export function decryptSecret(blob: string, key: Buffer): string {
  assertKey(key);
  if (!isCipherBlob(blob)) {
    throw new DecryptionError("Secret is not in the expected encrypted format");
  }

  const payload = Buffer.from(blob.slice(CIPHER_BLOB_PREFIX.length), "base64url");
  if (payload.length < IV_LENGTH + TAG_LENGTH) {
    throw new DecryptionError("Encrypted secret is truncated");
  }

  const iv = payload.subarray(0, IV_LENGTH);
  const tag = payload.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
  const ciphertext = payload.subarray(IV_LENGTH + TAG_LENGTH);

  try {
    const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
  } catch (error) {
    throw new DecryptionError("Encrypted secret failed authentication (wrong key or tampered data)", {
      cause: error
    });
  }
}

function assertKey(key: Buffer): void {
  if (key.length !== KEY_LENGTH) {
    throw new RangeError(`Encryption key must be ${KEY_LENGTH} bytes, got ${key.length}`);
  }
}
