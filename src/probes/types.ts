import type { AIModelInfo } from "../settings/types.js";

export type ProbeFailureReason = "auth" | "network" | "unexpected";

export type ProbeOutcome =
  | { ok: true; detail: string }
  | { ok: false; reason: ProbeFailureReason; detail: string };

export interface JenkinsTarget {
  url: string;
  username: string;
  token: string;
  verifySsl: boolean;
}

export interface JenkinsProbe {
  probe(target: JenkinsTarget, signal: AbortSignal): Promise<ProbeOutcome>;
}

export interface GitHubProbe {
  probe(token: string, signal: AbortSignal): Promise<ProbeOutcome>;
}

export interface AIProbe {
  probe(apiKey: string, model: string, signal: AbortSignal): Promise<ProbeOutcome>;
  /** Text-generation models visible to the key. Throws on failure. */
  listModels(apiKey: string, signal: AbortSignal): Promise<AIModelInfo[]>;
}

export interface Probes {
  jenkins: JenkinsProbe;
  github: GitHubProbe;
  ai: AIProbe;
}
