export { SettingsService, createSettingsService, isServiceName, DEFAULT_CONNECTION_TIMEOUT_MS } from "./service.js";
export type { SettingsServiceOptions, CreateSettingsServiceOptions } from "./service.js";
export { SettingsStore, upgradeDocument, writeFileAtomic } from "./store.js";
export type { SettingsStoreOptions } from "./store.js";
export type { UpgradeOptions } from "./schema.js";
export { KeyManager } from "./key-manager.js";
export { encryptSecret, decryptSecret, isCipherBlob, KEY_LENGTH } from "./cipher.js";
export { decryptLegacySecret, isLegacyCiphertext, legacyPasswordFromEnv } from "./legacy-cipher.js";
export { mergeSettings, sealDraft, toDraft } from "./merge.js";
export { validateSettings, checkJenkinsUrl } from "./validation.js";
export { redactSettings, scrubSecrets } from "./redaction.js";
export { reportSecretStatus, reportServiceStatus } from "./status.js";
export { CURRENT_SCHEMA_VERSION, DEFAULT_AI_MODEL, THEMES, createDefaultDocument } from "./schema.js";
export { Mutex } from "./mutex.js";
export {
  SettingsError,
  ValidationError,
  StoreCorruptError,
  UnsupportedSchemaVersionError,
  KeyCorruptError,
  DecryptionError,
  RestoreFormatError
} from "./errors.js";
export type { SettingsErrorCode } from "./errors.js";
export * from "./types.js";
export { GeminiProbe, createGenAIClient } from "../probes/ai.js";
export type { GenAIClient, GenAIClientFactory, GenAIModel } from "../probes/ai.js";
export { OctokitGitHubProbe } from "../probes/github.js";
export { HttpJenkinsProbe } from "../probes/jenkins.js";
export { TimeoutError, withTimeout } from "../probes/timeout.js";
export type { AIProbe, GitHubProbe, JenkinsProbe, JenkinsTarget, ProbeOutcome, Probes } from "../probes/types.js";
export { loadConfig, getDefaultConfig, resolveStoragePaths } from "../config/testsift.config.js";
export type { TestsiftConfig } from "../config/testsift.config.js";
