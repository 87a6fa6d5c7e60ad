import { createCipheriv, createHmac } from "crypto";
import { deriveLegacyKey } from "./legacy-cipher.js";

const toUrlSafe = (data: Buffer) => data.toString("base64").replace(/\+/g, "-").replace(/\//g, "_");

/**
 * Produce a secret the way releases before schema_version 2 stored it: a
 * Fernet token, base64url-encoded once more. Test-only.
 */
export function encryptLegacySecret(plaintext: string, password: string): string {
  const key = deriveLegacyKey(password);
  const timestamp = Buffer.alloc(8);
  timestamp.writeBigUInt64BE(1_700_000_000n);
  const iv = Buffer.alloc(16, 7);

  const cipher = createCipheriv("aes-128-cbc", key.subarray(16), iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
  const signed = Buffer.concat([Buffer.from([0x80]), timestamp, iv, ciphertext]);
  const hmac = createHmac("sha256", key.subarray(0, 16)).update(signed).digest();

  const token = toUrlSafe(Buffer.concat([signed, hmac]));
  return toUrlSafe(Buffer.from(token, "latin1"));
}
