import type { FieldErrors } from "./types.js";

export type SettingsErrorCode =
  | "validation_failed"
  | "store_corrupt"
  | "unsupported_schema_version"
  | "key_corrupt"
  | "decryption_failed"
  | "restore_format";

/**
 * Base class for settings failures. `code` is stable and safe to branch on;
 * messages never carry secret values.
 */
export class SettingsError extends Error {
  readonly code: SettingsErrorCode;

  constructor(code: SettingsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends SettingsError {
  readonly fieldErrors: FieldErrors;

  constructor(fieldErrors: FieldErrors) {
    super("validation_failed", `Settings validation failed: ${Object.keys(fieldErrors).join(", ")}`);
    this.fieldErrors = fieldErrors;
  }
}

export class StoreCorruptError extends SettingsError {
  readonly filePath: string;

  constructor(
    filePath: string,
    message: string,
    options?: { cause?: unknown; code?: "store_corrupt" | "unsupported_schema_version" }
  ) {
    super(options?.code ?? "store_corrupt", message, options);
    this.filePath = filePath;
  }
}

export class UnsupportedSchemaVersionError extends StoreCorruptError {
  readonly schemaVersion: number;

  constructor(filePath: string, schemaVersion: number, supported: number) {
    super(
      filePath,
      `Settings file ${filePath} has schema_version ${schemaVersion}; this release supports up to ${supported}`,
      { code: "unsupported_schema_version" }
    );
    this.schemaVersion = schemaVersion;
  }
}

export class KeyCorruptError extends SettingsError {
  readonly keyPath: string;

  constructor(keyPath: string, message: string, options?: { cause?: unknown }) {
    super("key_corrupt", message, options);
    this.keyPath = keyPath;
  }
}

export class DecryptionError extends SettingsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("decryption_failed", message, options);
  }
}

export class RestoreFormatError extends SettingsError {
  readonly fieldErrors?: FieldErrors;

  constructor(message: string, fieldErrors?: FieldErrors) {
    super("restore_format", message);
    this.fieldErrors = fieldErrors;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
