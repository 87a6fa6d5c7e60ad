import { createDecipheriv, createHmac, pbkdf2Sync, timingSafeEqual } from "crypto";

/**
 * Secrets written by releases before schema_version 2 are Fernet tokens,
 * base64url-encoded once more, under a key derived from a shared password.
 */
export const DEFAULT_LEGACY_PASSWORD = "default-key-change-me";

const LEGACY_SALT = "testinsight_salt";
const LEGACY_ITERATIONS = 100_000;
const LEGACY_CIPHERTEXT_PATTERN = /^[A-Za-z0-9_=-]{41,}$/;

const FERNET_VERSION = 0x80;
const FERNET_HEADER_LENGTH = 1 + 8 + 16;
const FERNET_HMAC_LENGTH = 32;

const derivedKeys = new Map<string, Buffer>();

/**
 * Password for legacy secrets: SETTINGS_ENCRYPTION_KEY when set. An empty
 * value derived the key from "default".
 */
export function legacyPasswordFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  const password = env.SETTINGS_ENCRYPTION_KEY ?? DEFAULT_LEGACY_PASSWORD;
  return password || "default";
}

export function isLegacyCiphertext(value: string): boolean {
  if (!LEGACY_CIPHERTEXT_PATTERN.test(value)) {
    return false;
  }
  return Buffer.from(value, "base64").toString("latin1").startsWith("gAAAAA");
}

/**
 * Decrypt a legacy secret. Returns null when the token is malformed or was
 * sealed under a different password.
 */
export function decryptLegacySecret(value: string, password: string): string | null {
  const token = Buffer.from(Buffer.from(value, "base64").toString("latin1"), "base64");
  if (
    token.length < FERNET_HEADER_LENGTH + 16 + FERNET_HMAC_LENGTH ||
    token[0] !== FERNET_VERSION ||
    (token.length - FERNET_HEADER_LENGTH - FERNET_HMAC_LENGTH) % 16 !== 0
  ) {
    return null;
  }

  const key = deriveLegacyKey(password);
  const signingKey = key.subarray(0, 16);
  const encryptionKey = key.subarray(16);

  const signed = token.subarray(0, token.length - FERNET_HMAC_LENGTH);
  const expected = createHmac("sha256", signingKey).update(signed).digest();
  if (!timingSafeEqual(expected, token.subarray(token.length - FERNET_HMAC_LENGTH))) {
    return null;
  }

  const iv = token.subarray(9, FERNET_HEADER_LENGTH);
  const ciphertext = signed.subarray(FERNET_HEADER_LENGTH);
  try {
    const decipher = createDecipheriv("aes-128-cbc", encryptionKey, iv);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf-8");
  } catch {
    return null;
  }
}

export function deriveLegacyKey(password: string): Buffer {
  let key = derivedKeys.get(password);
  if (!key) {
    key = pbkdf2Sync(password, LEGACY_SALT, LEGACY_ITERATIONS, 32, "sha256");
    derivedKeys.set(password, key);
  }
  return key;
}
