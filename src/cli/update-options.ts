import { InvalidArgumentError } from "commander";
import { THEMES } from "../settings/schema.js";
import type { ConnectionOverride, SettingsUpdate, Theme } from "../settings/types.js";

export interface SetCommandOptions {
  jenkinsUrl?: string;
  jenkinsUsername?: string;
  jenkinsToken?: string;
  jenkinsVerifySsl?: boolean;
  githubToken?: string;
  aiKey?: string;
  aiModel?: string;
  aiTemperature?: number;
  aiMaxTokens?: number;
  theme?: Theme;
  language?: string;
  autoRefresh?: boolean;
  resultsPerPage?: number;
}

export interface TestCommandOptions {
  url?: string;
  username?: string;
  apiToken?: string;
  token?: string;
  apiKey?: string;
  model?: string;
  insecure?: boolean;
}

export function parseBooleanOption(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["true", "yes", "on", "1"].includes(normalized)) return true;
  if (["false", "no", "off", "0"].includes(normalized)) return false;
  throw new InvalidArgumentError("Expected true or false.");
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return parsed;
}

export function parseThemeOption(value: string): Theme {
  const theme = THEMES.find(candidate => candidate === value.trim().toLowerCase());
  if (!theme) {
    throw new InvalidArgumentError(`Expected one of: ${THEMES.join(", ")}.`);
  }
  return theme;
}

/**
 * Map `settings set` flags onto a partial update. Sections without any flag
 * are left out so they stay untouched.
 */
export function buildSettingsUpdate(options: SetCommandOptions): SettingsUpdate {
  const update: SettingsUpdate = {};

  const jenkins = compact({
    url: options.jenkinsUrl,
    username: options.jenkinsUsername,
    api_token: options.jenkinsToken,
    verify_ssl: options.jenkinsVerifySsl
  });
  if (jenkins) update.jenkins = jenkins;

  const github = compact({ token: options.githubToken });
  if (github) update.github = github;

  const ai = compact({
    api_key: options.aiKey,
    model: options.aiModel,
    temperature: options.aiTemperature,
    max_tokens: options.aiMaxTokens
  });
  if (ai) update.ai = ai;

  const preferences = compact({
    theme: options.theme,
    language: options.language,
    auto_refresh: options.autoRefresh,
    results_per_page: options.resultsPerPage
  });
  if (preferences) update.preferences = preferences;

  return update;
}

export function buildConnectionOverride(options: TestCommandOptions): ConnectionOverride {
  return (
    compact({
      url: options.url,
      username: options.username,
      api_token: options.apiToken,
      token: options.token,
      api_key: options.apiKey,
      model: options.model,
      verify_ssl: options.insecure ? false : undefined
    }) ?? {}
  );
}

/** Drop undefined entries; null when nothing is left. */
function compact<T extends Record<string, unknown>>(values: T): Partial<T> | null {
  const result: Partial<T> = {};
  let count = 0;
  for (const key of Object.keys(values)) {
    const value = values[key];
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
      count += 1;
    }
  }
  return count > 0 ? result : null;
}
