import { z } from "zod";
import { isCipherBlob } from "./cipher.js";
import { DEFAULT_LEGACY_PASSWORD, decryptLegacySecret, isLegacyCiphertext } from "./legacy-cipher.js";
import type { CipherBlob, FieldErrors, SettingsDocument } from "./types.js";

export const CURRENT_SCHEMA_VERSION = 2;

export const DEFAULT_AI_MODEL = "gemini-2.5-pro";

export const THEMES = ["light", "dark", "system"] as const;

const CipherBlobSchema = z.custom<CipherBlob>(isCipherBlob, {
  message: "Secret must be stored in encrypted form"
});

const SecretSchema = CipherBlobSchema.nullable().default(null);

const JenkinsSchema = z.object({
  url: z.string().nullable().default(null),
  username: z.string().nullable().default(null),
  api_token: SecretSchema,
  verify_ssl: z.boolean().default(true)
});

const GitHubSchema = z.object({
  token: SecretSchema
});

const AISchema = z.object({
  api_key: SecretSchema,
  model: z.string().default(DEFAULT_AI_MODEL),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().min(1).max(32768).default(4096)
});

const PreferencesSchema = z.object({
  theme: z.enum(THEMES).default("system"),
  language: z.string().default("en"),
  auto_refresh: z.boolean().default(true),
  results_per_page: z.number().int().min(1).max(100).default(20)
});

export const SettingsDocumentSchema = z.object({
  schema_version: z.literal(CURRENT_SCHEMA_VERSION),
  jenkins: JenkinsSchema.default({}),
  github: GitHubSchema.default({}),
  ai: AISchema.default({}),
  preferences: PreferencesSchema.default({}),
  last_updated: z.string().datetime({ offset: true }).nullable().default(null)
});

/**
 * Shape check of untyped input coming from an API layer. Ranges and formats
 * are left to validateSettings so they come back field-keyed with the rest.
 */
export const SettingsUpdateSchema = z
  .object({
    jenkins: z
      .object({
        url: z.string().nullable(),
        username: z.string().nullable(),
        api_token: z.string().nullable(),
        verify_ssl: z.boolean()
      })
      .partial()
      .strict(),
    github: z.object({ token: z.string().nullable() }).partial().strict(),
    ai: z
      .object({
        api_key: z.string().nullable(),
        model: z.string(),
        temperature: z.number(),
        max_tokens: z.number()
      })
      .partial()
      .strict(),
    preferences: z
      .object({
        theme: z.enum(THEMES),
        language: z.string(),
        auto_refresh: z.boolean(),
        results_per_page: z.number()
      })
      .partial()
      .strict()
  })
  .partial()
  .strict();

export function createDefaultDocument(lastUpdated: string | null = null): SettingsDocument {
  const defaults = SettingsDocumentSchema.parse({ schema_version: CURRENT_SCHEMA_VERSION });
  return { ...defaults, last_updated: lastUpdated };
}

export function zodIssuesToFieldErrors(error: z.ZodError): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const issue of error.errors) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    (fieldErrors[key] ??= []).push(issue.message);
  }
  return fieldErrors;
}

export type SecretSealer = (plaintext: string) => Promise<CipherBlob>;

export interface UpgradeOptions {
  /** Seals secrets found while upgrading a version 1 document. */
  seal?: SecretSealer;
  /** Password the version 1 secrets were encrypted under. */
  legacyPassword?: string;
}

const LEGACY_SECRET_FIELDS: Array<[section: string, legacyField: string, field: string]> = [
  ["jenkins", "api_token", "api_token"],
  ["github", "token", "token"],
  ["ai", "gemini_api_key", "api_key"]
];

/**
 * Read the schema_version of a raw document. Documents written before
 * versioning was introduced carry none and count as version 1.
 */
export function readSchemaVersion(raw: Record<string, unknown>): number | null {
  const version = raw.schema_version;
  if (version === undefined) {
    return 1;
  }
  return typeof version === "number" && Number.isInteger(version) && version >= 1 ? version : null;
}

/**
 * Upgrade a version 1 document: the AI key moves from ai.gemini_api_key to
 * ai.api_key and its secrets are re-sealed. Legacy-encrypted secrets that do
 * not decrypt are dropped so the user is asked for them again.
 */
export async function upgradeFromV1(
  raw: Record<string, unknown>,
  options: UpgradeOptions = {}
): Promise<Record<string, unknown>> {
  const upgraded: Record<string, unknown> = { ...raw, schema_version: 2 };

  for (const [section, legacyField, field] of LEGACY_SECRET_FIELDS) {
    const source = raw[section];
    if (!isRecord(source)) continue;

    const next: Record<string, unknown> = { ...source };
    const value = source[legacyField];
    delete next[legacyField];
    next[field] = null;
    upgraded[section] = next;

    if (typeof value !== "string" || !value.trim()) continue;

    const stored = value.trim();
    if (isCipherBlob(stored)) {
      next[field] = stored;
      continue;
    }

    let plaintext: string | null = stored;
    if (isLegacyCiphertext(stored)) {
      plaintext = decryptLegacySecret(stored, options.legacyPassword ?? DEFAULT_LEGACY_PASSWORD);
      if (plaintext === null) {
        console.warn(
          `[settings] Legacy ${section}.${legacyField} could not be decrypted (check SETTINGS_ENCRYPTION_KEY); it must be entered again`
        );
        continue;
      }
    }
    if (!plaintext.trim()) continue;

    if (!options.seal) {
      throw new Error(`Legacy ${section}.${legacyField} is stored in plaintext and no key is available to seal it`);
    }
    next[field] = await options.seal(plaintext.trim());
  }

  const ai = upgraded.ai;
  if (isRecord(ai) && ai.model === "") {
    upgraded.ai = { ...ai, model: DEFAULT_AI_MODEL };
  }

  const lastUpdated = upgraded.last_updated;
  if (typeof lastUpdated === "string" && !Number.isNaN(Date.parse(lastUpdated))) {
    upgraded.last_updated = new Date(lastUpdated).toISOString();
  } else {
    upgraded.last_updated = null;
  }

  return upgraded;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
