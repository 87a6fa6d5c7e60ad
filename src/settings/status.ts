import { isCipherBlob } from "./cipher.js";
import type { SecretStatus, ServiceStatus, SettingsDocument } from "./types.js";

function isSet(value: string | null): boolean {
  return value !== null && isCipherBlob(value);
}

/** Which secrets are stored. Presence only; nothing is decrypted. */
export function reportSecretStatus(doc: SettingsDocument): SecretStatus {
  return {
    jenkins: { api_token: isSet(doc.jenkins.api_token) },
    github: { token: isSet(doc.github.token) },
    ai: { api_key: isSet(doc.ai.api_key) }
  };
}

export function reportServiceStatus(doc: SettingsDocument): ServiceStatus {
  const secrets = reportSecretStatus(doc);
  const jenkinsConfig = {
    url: Boolean(doc.jenkins.url),
    username: Boolean(doc.jenkins.username),
    api_token: secrets.jenkins.api_token,
    verify_ssl: doc.jenkins.verify_ssl
  };

  return {
    jenkins: {
      configured: jenkinsConfig.url && jenkinsConfig.username && jenkinsConfig.api_token,
      config: jenkinsConfig
    },
    github: {
      configured: secrets.github.token,
      config: { token: secrets.github.token }
    },
    ai: {
      configured: secrets.ai.api_key,
      config: {
        api_key: secrets.ai.api_key,
        model: doc.ai.model,
        temperature: doc.ai.temperature,
        max_tokens: doc.ai.max_tokens
      }
    }
  };
}
