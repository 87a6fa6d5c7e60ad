import { Octokit } from "@octokit/rest";
import { describeError } from "../settings/errors.js";
import type { GitHubProbe, ProbeOutcome } from "./types.js";

export interface OctokitGitHubProbeOptions {
  baseUrl?: string;
  /** Replaces the global fetch; tests pass a stub. */
  fetch?: typeof fetch;
}

export class OctokitGitHubProbe implements GitHubProbe {
  constructor(private readonly options: OctokitGitHubProbeOptions = {}) {}

  async probe(token: string, signal: AbortSignal): Promise<ProbeOutcome> {
    const octokit = new Octokit({
      auth: token,
      baseUrl: this.options.baseUrl,
      userAgent: "testsift",
      request: { fetch: this.options.fetch, signal }
    });

    try {
      const { data } = await octokit.rest.users.getAuthenticated();
      return { ok: true, detail: `Authenticated as ${data.login}` };
    } catch (error) {
      const http = readHttpError(error);
      if (http && http.hasResponse) {
        if (http.status === 401 || http.status === 403) {
          return { ok: false, reason: "auth", detail: `GitHub rejected the token (HTTP ${http.status})` };
        }
        return { ok: false, reason: "unexpected", detail: `GitHub API error: HTTP ${http.status}` };
      }
      return { ok: false, reason: "network", detail: `Could not reach GitHub: ${describeError(error)}` };
    }
  }
}

function readHttpError(error: unknown): { status: number; hasResponse: boolean } | null {
  if (!(error instanceof Error) || !("status" in error) || typeof error.status !== "number") {
    return null;
  }
  const hasResponse = "response" in error && error.response !== undefined && error.response !== null;
  return { status: error.status, hasResponse };
}
