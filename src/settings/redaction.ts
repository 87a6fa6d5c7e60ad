import { REDACTED_SECRET, type CipherBlob, type RedactedSecret, type RedactedSettings, type SettingsDocument } from "./types.js";

export function redactSecret(blob: CipherBlob | null): RedactedSecret {
  return blob ? REDACTED_SECRET : null;
}

/**
 * The document as shown to callers: secrets become a fixed placeholder when
 * set and null when not.
 */
export function redactSettings(doc: SettingsDocument): RedactedSettings {
  return {
    schema_version: doc.schema_version,
    jenkins: { ...doc.jenkins, api_token: redactSecret(doc.jenkins.api_token) },
    github: { token: redactSecret(doc.github.token) },
    ai: { ...doc.ai, api_key: redactSecret(doc.ai.api_key) },
    preferences: { ...doc.preferences },
    last_updated: doc.last_updated
  };
}

/**
 * Replace every occurrence of the given secret values in a message.
 */
export function scrubSecrets(text: string, secrets: Array<string | null | undefined>): string {
  let scrubbed = text;
  for (const secret of secrets) {
    if (secret && secret.length >= 4) {
      scrubbed = scrubbed.split(secret).join(REDACTED_SECRET);
    }
  }
  return scrubbed;
}
