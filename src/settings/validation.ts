import { THEMES } from "./schema.js";
import type { FieldErrors, SecretSlot, SettingsDraft } from "./types.js";

const DANGEROUS_URL_PATTERNS = ["javascript:", "<script", "</script", "onclick=", "onerror="];
const TOKEN_FORBIDDEN = ["<", ">", '"', "'", "&"];
const USERNAME_FORBIDDEN = ["<", ">", '"', "'", "&", ";", "|"];

const MODEL_PATTERN = /^[A-Za-z0-9._\-/]+$/;
const LANGUAGE_PATTERN = /^[a-z]{2}(-[A-Z]{2})?$/;

const AI_KEY_PREFIX = "AIzaSy";
const AI_KEY_LENGTH = 39;
const GITHUB_TOKEN_MIN_LENGTH = 10;

/**
 * Validate a merged draft. Pure: no I/O, no decryption. Stored secrets were
 * validated when they were supplied, so only fresh ones are format-checked.
 */
export function validateSettings(draft: SettingsDraft): FieldErrors {
  const errors: FieldErrors = {};
  const add = (field: string, message: string) => {
    (errors[field] ??= []).push(message);
  };

  const { jenkins, github, ai, preferences } = draft;

  if (jenkins.url) {
    for (const message of checkJenkinsUrl(jenkins.url)) add("jenkins.url", message);
    if (!jenkins.username) add("jenkins.username", "Jenkins username is required when URL is provided");
    if (jenkins.api_token.state === "empty") {
      add("jenkins.api_token", "Jenkins API token is required when URL is provided");
    }
  }
  if (jenkins.username && USERNAME_FORBIDDEN.some(char => jenkins.username?.includes(char))) {
    add("jenkins.username", "Username contains invalid characters");
  }
  const jenkinsToken = freshValue(jenkins.api_token);
  if (jenkinsToken !== null && containsForbidden(jenkinsToken)) {
    add("jenkins.api_token", "Token contains invalid characters");
  }

  const githubToken = freshValue(github.token);
  if (githubToken !== null) {
    if (containsForbidden(githubToken)) {
      add("github.token", "Token contains invalid characters");
    } else if (githubToken.length < GITHUB_TOKEN_MIN_LENGTH) {
      add("github.token", "GitHub token appears to be too short");
    }
  }

  const apiKey = freshValue(ai.api_key);
  if (apiKey !== null) {
    if (containsForbidden(apiKey)) {
      add("ai.api_key", "Token contains invalid characters");
    } else {
      if (!apiKey.startsWith(AI_KEY_PREFIX)) add("ai.api_key", `API key should start with '${AI_KEY_PREFIX}'`);
      if (apiKey.length !== AI_KEY_LENGTH) add("ai.api_key", `API key should be ${AI_KEY_LENGTH} characters long`);
    }
  }

  if (!MODEL_PATTERN.test(ai.model)) {
    add("ai.model", "Model name may only contain letters, digits, '.', '_', '-' and '/'");
  }
  if (!Number.isFinite(ai.temperature) || ai.temperature < 0 || ai.temperature > 2) {
    add("ai.temperature", "Temperature must be between 0.0 and 2.0");
  }
  if (!Number.isInteger(ai.max_tokens) || ai.max_tokens < 1 || ai.max_tokens > 32768) {
    add("ai.max_tokens", "Max tokens must be an integer between 1 and 32768");
  }

  if (!THEMES.some(theme => theme === preferences.theme)) {
    add("preferences.theme", `Theme must be one of: ${THEMES.join(", ")}`);
  }
  if (!LANGUAGE_PATTERN.test(preferences.language)) {
    add("preferences.language", "Language must look like 'en' or 'en-US'");
  }
  if (
    !Number.isInteger(preferences.results_per_page) ||
    preferences.results_per_page < 1 ||
    preferences.results_per_page > 100
  ) {
    add("preferences.results_per_page", "Results per page must be an integer between 1 and 100");
  }

  return errors;
}

/**
 * Messages for a Jenkins URL. Plain http is accepted; the service warns about it.
 */
export function checkJenkinsUrl(url: string): string[] {
  const lowered = url.toLowerCase();
  const dangerous = DANGEROUS_URL_PATTERNS.find(pattern => lowered.includes(pattern));
  if (dangerous) {
    return [`URL contains potentially dangerous content: ${dangerous}`];
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return ["Jenkins URL is not a valid URL"];
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return ["Jenkins URL must start with http:// or https://"];
  }
  if (!parsed.hostname) {
    return ["Jenkins URL must include a host"];
  }
  return [];
}

export function isPlainHttpUrl(url: string | null): boolean {
  return url !== null && url.toLowerCase().startsWith("http://");
}

function freshValue(slot: SecretSlot): string | null {
  return slot.state === "fresh" ? slot.plaintext : null;
}

function containsForbidden(value: string): boolean {
  return TOKEN_FORBIDDEN.some(char => value.includes(char));
}
