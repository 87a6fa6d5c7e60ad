import type {
  CipherBlob,
  SecretSlot,
  SettingsDocument,
  SettingsDraft,
  SettingsUpdate
} from "./types.js";

/**
 * Lift a stored document into a draft: every present secret becomes a
 * "stored" slot that the merge will carry through untouched.
 */
export function toDraft(doc: SettingsDocument): SettingsDraft {
  return {
    schema_version: doc.schema_version,
    jenkins: { ...doc.jenkins, api_token: storedSlot(doc.jenkins.api_token) },
    github: { token: storedSlot(doc.github.token) },
    ai: { ...doc.ai, api_key: storedSlot(doc.ai.api_key) },
    preferences: { ...doc.preferences },
    last_updated: doc.last_updated
  };
}

/**
 * Apply a partial update onto the current document.
 *
 * Non-secret fields overwrite when present. Secret fields overwrite only when
 * the incoming value is non-blank; blank or missing keeps the stored blob.
 */
export function mergeSettings(current: SettingsDocument, update: SettingsUpdate): SettingsDraft {
  const draft = toDraft(current);

  if (update.jenkins) {
    const { url, username, api_token, verify_ssl } = update.jenkins;
    if (url !== undefined) draft.jenkins.url = normalizeOptionalText(url);
    if (username !== undefined) draft.jenkins.username = normalizeOptionalText(username);
    if (verify_ssl !== undefined) draft.jenkins.verify_ssl = verify_ssl;
    draft.jenkins.api_token = mergeSecret(draft.jenkins.api_token, api_token);
  }

  if (update.github) {
    draft.github.token = mergeSecret(draft.github.token, update.github.token);
  }

  if (update.ai) {
    const { api_key, model, temperature, max_tokens } = update.ai;
    if (model !== undefined) draft.ai.model = model.trim();
    if (temperature !== undefined) draft.ai.temperature = temperature;
    if (max_tokens !== undefined) draft.ai.max_tokens = max_tokens;
    draft.ai.api_key = mergeSecret(draft.ai.api_key, api_key);
  }

  if (update.preferences) {
    const { theme, language, auto_refresh, results_per_page } = update.preferences;
    if (theme !== undefined) draft.preferences.theme = theme;
    if (language !== undefined) draft.preferences.language = language.trim();
    if (auto_refresh !== undefined) draft.preferences.auto_refresh = auto_refresh;
    if (results_per_page !== undefined) draft.preferences.results_per_page = results_per_page;
  }

  return draft;
}

/**
 * Turn a validated draft back into a storable document. Only fresh slots are
 * encrypted; stored blobs are reused byte for byte.
 */
export function sealDraft(
  draft: SettingsDraft,
  seal: (plaintext: string) => CipherBlob,
  lastUpdated: string
): SettingsDocument {
  return {
    schema_version: draft.schema_version,
    jenkins: { ...draft.jenkins, api_token: sealSlot(draft.jenkins.api_token, seal) },
    github: { token: sealSlot(draft.github.token, seal) },
    ai: { ...draft.ai, api_key: sealSlot(draft.ai.api_key, seal) },
    preferences: { ...draft.preferences },
    last_updated: lastUpdated
  };
}

export function hasFreshSecrets(draft: SettingsDraft): boolean {
  return [draft.jenkins.api_token, draft.github.token, draft.ai.api_key].some(slot => slot.state === "fresh");
}

export function freshSecretValues(draft: SettingsDraft): string[] {
  const values: string[] = [];
  for (const slot of [draft.jenkins.api_token, draft.github.token, draft.ai.api_key]) {
    if (slot.state === "fresh") values.push(slot.plaintext);
  }
  return values;
}

export function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === "";
}

function mergeSecret(existing: SecretSlot, incoming: string | null | undefined): SecretSlot {
  if (incoming === undefined || incoming === null || isBlank(incoming)) {
    return existing;
  }
  return { state: "fresh", plaintext: incoming.trim() };
}

function storedSlot(blob: CipherBlob | null): SecretSlot {
  return blob ? { state: "stored", blob } : { state: "empty" };
}

function sealSlot(slot: SecretSlot, seal: (plaintext: string) => CipherBlob): CipherBlob | null {
  switch (slot.state) {
    case "empty":
      return null;
    case "stored":
      return slot.blob;
    case "fresh":
      return seal(slot.plaintext);
  }
}

function normalizeOptionalText(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
