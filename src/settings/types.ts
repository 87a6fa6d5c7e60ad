/**
 * Types for the persisted settings document and its views
 */

export const CIPHER_BLOB_PREFIX = "enc:v1:";

/** Persisted form of a secret: AES-256-GCM output, base64url encoded. */
export type CipherBlob = `${typeof CIPHER_BLOB_PREFIX}${string}`;

export const REDACTED_SECRET = "********";
export type RedactedSecret = typeof REDACTED_SECRET | null;

export type Theme = "light" | "dark" | "system";

export type SettingsDomain = "jenkins" | "github" | "ai" | "preferences";

export type ServiceName = "jenkins" | "github" | "ai";

export interface JenkinsSettings<TSecret> {
  url: string | null;
  username: string | null;
  api_token: TSecret;
  verify_ssl: boolean;
}

export interface GitHubSettings<TSecret> {
  token: TSecret;
}

export interface AISettings<TSecret> {
  api_key: TSecret;
  model: string;
  temperature: number;
  max_tokens: number;
}

export interface Preferences {
  theme: Theme;
  language: string;
  auto_refresh: boolean;
  results_per_page: number;
}

/**
 * The settings document, parameterised over how secret fields are held:
 * ciphertext on disk, a slot while merging, a placeholder when shown.
 */
export interface SettingsShape<TSecret> {
  schema_version: number;
  jenkins: JenkinsSettings<TSecret>;
  github: GitHubSettings<TSecret>;
  ai: AISettings<TSecret>;
  preferences: Preferences;
  last_updated: string | null;
}

export type SettingsDocument = SettingsShape<CipherBlob | null>;

export type RedactedSettings = SettingsShape<RedactedSecret>;

export type SecretSlot =
  | { state: "empty" }
  | { state: "stored"; blob: CipherBlob }        // kept as-is, never re-encrypted
  | { state: "fresh"; plaintext: string };      // supplied by this update

export type SettingsDraft = SettingsShape<SecretSlot>;

/**
 * Partial update. A missing key means "leave unchanged"; for secrets an empty
 * or whitespace-only string means the same thing.
 */
export interface SettingsUpdate {
  jenkins?: {
    url?: string | null;
    username?: string | null;
    api_token?: string | null;
    verify_ssl?: boolean;
  };
  github?: {
    token?: string | null;
  };
  ai?: {
    api_key?: string | null;
    model?: string;
    temperature?: number;
    max_tokens?: number;
  };
  preferences?: Partial<Preferences>;
}

/** Field path (e.g. "jenkins.url") to the messages raised for it. */
export type FieldErrors = Record<string, string[]>;

export interface SecretStatus {
  jenkins: { api_token: boolean };
  github: { token: boolean };
  ai: { api_key: boolean };
}

export interface ServiceStatus {
  jenkins: {
    configured: boolean;
    config: { url: boolean; username: boolean; api_token: boolean; verify_ssl: boolean };
  };
  github: {
    configured: boolean;
    config: { token: boolean };
  };
  ai: {
    configured: boolean;
    config: { api_key: boolean; model: string; temperature: number; max_tokens: number };
  };
}

export type ConnectionFailureKind =
  | "auth"            // credentials rejected
  | "network"         // host unreachable, TLS or DNS failure
  | "timeout"         // no answer within the configured bound
  | "misconfigured"   // required field missing
  | "integrity"       // stored secret or settings file unreadable
  | "unexpected"      // service answered, but not with success or an auth error
  | "unsupported";    // unknown service name

export interface ConnectionTestResult {
  service: string;
  success: boolean;
  message: string;
  error_details?: string;
  failure_kind?: ConnectionFailureKind;
}

/** Values that take precedence over stored settings for a single connection test. */
export interface ConnectionOverride {
  url?: string | null;
  username?: string | null;
  api_token?: string | null;
  verify_ssl?: boolean;
  token?: string | null;
  api_key?: string | null;
  model?: string | null;
}

export interface AIModelInfo {
  name: string;
  display_name: string;
  description?: string;
  version?: string;
  input_token_limit?: number;
  output_token_limit?: number;
  supported_actions: string[];
}

export interface ModelListResult {
  success: boolean;
  models: AIModelInfo[];
  total_count: number;
  message: string;
  error_details?: string;
}

export const BACKUP_FORMAT = "testsift-settings-backup";

export interface SettingsBackup {
  format: typeof BACKUP_FORMAT;
  schema_version: number;
  created_at: string;
  settings: SettingsDocument;
}
