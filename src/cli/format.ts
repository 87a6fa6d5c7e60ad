import type {
  ConnectionTestResult,
  FieldErrors,
  ModelListResult,
  RedactedSettings,
  ServiceStatus
} from "../settings/types.js";

export function formatFieldErrors(fieldErrors: FieldErrors): string[] {
  return Object.entries(fieldErrors).flatMap(([field, messages]) => messages.map(message => `${field}: ${message}`));
}

export function formatSettings(settings: RedactedSettings): string[] {
  const show = (value: string | number | boolean | null) => (value === null ? "(not set)" : String(value));
  return [
    "Jenkins",
    `  url:          ${show(settings.jenkins.url)}`,
    `  username:     ${show(settings.jenkins.username)}`,
    `  api_token:    ${show(settings.jenkins.api_token)}`,
    `  verify_ssl:   ${show(settings.jenkins.verify_ssl)}`,
    "GitHub",
    `  token:        ${show(settings.github.token)}`,
    "AI",
    `  api_key:      ${show(settings.ai.api_key)}`,
    `  model:        ${show(settings.ai.model)}`,
    `  temperature:  ${show(settings.ai.temperature)}`,
    `  max_tokens:   ${show(settings.ai.max_tokens)}`,
    "Preferences",
    `  theme:            ${show(settings.preferences.theme)}`,
    `  language:         ${show(settings.preferences.language)}`,
    `  auto_refresh:     ${show(settings.preferences.auto_refresh)}`,
    `  results_per_page: ${show(settings.preferences.results_per_page)}`,
    `Last updated: ${show(settings.last_updated)}`
  ];
}

export function formatServiceStatus(status: ServiceStatus): string[] {
  const mark = (value: boolean) => (value ? "configured" : "not configured");
  return [
    `jenkins  ${mark(status.jenkins.configured)}`,
    `github   ${mark(status.github.configured)}`,
    `ai       ${mark(status.ai.configured)} (model ${status.ai.config.model})`
  ];
}

export function formatConnectionResult(result: ConnectionTestResult): string[] {
  const lines = [result.message];
  if (!result.success) {
    if (result.failure_kind) lines.push(`kind: ${result.failure_kind}`);
    if (result.error_details) lines.push(`details: ${result.error_details}`);
  }
  return lines;
}

export function formatModelList(result: ModelListResult): string[] {
  if (!result.success) {
    return [result.message, ...(result.error_details ? [`details: ${result.error_details}`] : [])];
  }
  return [
    result.message,
    ...result.models.map(model =>
      model.output_token_limit !== undefined
        ? `${model.name}  ${model.display_name} (max output ${model.output_token_limit})`
        : `${model.name}  ${model.display_name}`
    )
  ];
}
