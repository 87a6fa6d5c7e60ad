import axios, { type AxiosRequestConfig } from "axios";
import https from "https";
import { describeError } from "../settings/errors.js";
import type { JenkinsProbe, JenkinsTarget, ProbeOutcome } from "./types.js";

/**
 * Request options for `GET <url>/api/json`. Every status is returned to the
 * caller; verify_ssl only affects the agent of this one request.
 */
export function buildJenkinsRequest(target: JenkinsTarget, signal: AbortSignal): AxiosRequestConfig {
  return {
    auth: { username: target.username, password: target.token },
    headers: { Accept: "application/json" },
    responseType: "text",
    validateStatus: () => true,
    httpsAgent: new https.Agent({ rejectUnauthorized: target.verifySsl }),
    proxy: false,
    signal
  };
}

/**
 * Checks Jenkins reachability and credentials with `GET <url>/api/json` over
 * basic auth.
 */
export class HttpJenkinsProbe implements JenkinsProbe {
  async probe(target: JenkinsTarget, signal: AbortSignal): Promise<ProbeOutcome> {
    let endpoint: URL;
    try {
      endpoint = new URL("api/json", target.url.endsWith("/") ? target.url : `${target.url}/`);
    } catch {
      return { ok: false, reason: "unexpected", detail: "Jenkins URL is not a valid URL" };
    }
    if (endpoint.protocol !== "http:" && endpoint.protocol !== "https:") {
      return { ok: false, reason: "unexpected", detail: `Unsupported protocol ${endpoint.protocol}` };
    }

    let status: number;
    let body: string;
    let version: unknown;
    try {
      const response = await axios.get<string>(endpoint.toString(), buildJenkinsRequest(target, signal));
      status = response.status;
      body = response.data;
      version = response.headers["x-jenkins"];
    } catch (error) {
      // Connection failures on dual-stack hosts can carry an empty message.
      const detail = describeError(error) || (axios.isAxiosError(error) && error.code) || "connection failed";
      return { ok: false, reason: "network", detail: `Could not reach Jenkins: ${detail}` };
    }

    if (status === 401 || status === 403) {
      return { ok: false, reason: "auth", detail: `Jenkins rejected the credentials (HTTP ${status})` };
    }
    if (status < 200 || status >= 300) {
      return { ok: false, reason: "unexpected", detail: `Jenkins returned HTTP ${status}` };
    }

    try {
      JSON.parse(body);
    } catch {
      return { ok: false, reason: "unexpected", detail: "Response from Jenkins was not JSON" };
    }

    return {
      ok: true,
      detail: typeof version === "string" ? `Connected to Jenkins ${version}` : "Connected to Jenkins"
    };
  }
}
