import { ApiError, GoogleGenAI } from "@google/genai";
import { describeError } from "../settings/errors.js";
import type { AIModelInfo } from "../settings/types.js";
import type { AIProbe, ProbeOutcome } from "./types.js";

/** The slice of a Gen AI model record this module reads. */
export interface GenAIModel {
  name?: string;
  displayName?: string;
  description?: string;
  version?: string;
  inputTokenLimit?: number;
  outputTokenLimit?: number;
  supportedActions?: string[];
}

export interface GenAIClient {
  models: {
    get(params: { model: string; config?: { abortSignal?: AbortSignal } }): Promise<GenAIModel>;
    list(params?: { config?: { pageSize?: number; abortSignal?: AbortSignal } }): Promise<AsyncIterable<GenAIModel>>;
  };
}

export type GenAIClientFactory = (apiKey: string) => GenAIClient;

export const createGenAIClient: GenAIClientFactory = apiKey => new GoogleGenAI({ apiKey });

// Non-text models the triage flow has no use for
const EXCLUDED_MODEL_KEYWORDS = [
  "embedding",
  "embed",
  "imagen",
  "imagetext",
  "video",
  "audio",
  "multimodal",
  "mm",
  "search",
  "retrieval",
  "code-",
  "codechat"
];

export class GeminiProbe implements AIProbe {
  constructor(private readonly createClient: GenAIClientFactory = createGenAIClient) {}

  async probe(apiKey: string, model: string, signal: AbortSignal): Promise<ProbeOutcome> {
    const client = this.createClient(apiKey);
    try {
      const info = await client.models.get({ model: qualifiedModelName(model), config: { abortSignal: signal } });
      return { ok: true, detail: `Model ${info.displayName ?? model} is available` };
    } catch (error) {
      return classifyGenAIError(error);
    }
  }

  async listModels(apiKey: string, signal: AbortSignal): Promise<AIModelInfo[]> {
    const client = this.createClient(apiKey);
    const pager = await client.models.list({ config: { pageSize: 100, abortSignal: signal } });

    const models: AIModelInfo[] = [];
    for await (const model of pager) {
      const info = toModelInfo(model);
      if (info) models.push(info);
    }
    return models;
  }
}

/**
 * Keep text-generation models only. Returns null for anything filtered out.
 */
export function toModelInfo(model: GenAIModel): AIModelInfo | null {
  if (!model.name || !model.supportedActions?.includes("generateContent")) {
    return null;
  }
  const name = model.name.replace(/^models\//, "");
  const lowered = name.toLowerCase();
  if (EXCLUDED_MODEL_KEYWORDS.some(keyword => lowered.includes(keyword))) {
    return null;
  }
  return {
    name,
    display_name: model.displayName ?? name,
    description: model.description,
    version: model.version,
    input_token_limit: model.inputTokenLimit,
    output_token_limit: model.outputTokenLimit,
    supported_actions: [...model.supportedActions]
  };
}

export function classifyGenAIError(error: unknown): ProbeOutcome & { ok: false } {
  if (error instanceof ApiError) {
    if (error.status === 401 || error.status === 403 || (error.status === 400 && /api[_ ]key/i.test(error.message))) {
      return { ok: false, reason: "auth", detail: "The AI service rejected the API key" };
    }
    if (error.status === 404) {
      return { ok: false, reason: "unexpected", detail: "Model not found" };
    }
    if (error.status === 429) {
      return { ok: false, reason: "unexpected", detail: "API quota exceeded" };
    }
    return { ok: false, reason: "unexpected", detail: `AI service error: HTTP ${error.status}` };
  }
  return { ok: false, reason: "network", detail: `Could not reach the AI service: ${describeError(error)}` };
}

function qualifiedModelName(model: string): string {
  return model.startsWith("models/") ? model : `models/${model}`;
}
