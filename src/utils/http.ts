// CHANGE: Shared axios client, single-flight request gate and error description helpers.
// WHY: Exactly one request may be in flight across listing and updating; failures are classified, not retried here.

import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import pLimit from "p-limit";
import type { ApiSettings } from "../config.js";

const JSON_API = "application/vnd.api+json";

const requestGate = pLimit(1);

/**
 * Create the HTTP client used for every call of one run.
 *
 * @param api - Endpoint settings (timeout).
 * @param token - API token sent as `Authorization: token <token>`.
 */
export function createApiClient(api: ApiSettings, token: string): AxiosInstance {
  return axios.create({
    timeout: api.timeoutMs,
    maxRedirects: 5,
    headers: {
      "User-Agent": "ProjectFrequencyUpdater/1.0",
      Authorization: `token ${token}`,
      Accept: JSON_API,
      "Content-Type": JSON_API
    }
  });
}

/**
 * Run one request through the process-wide gate of concurrency 1.
 */
export function serialised<T>(operation: () => Promise<T>): Promise<T> {
  return requestGate(operation);
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

export function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    }
  }
  return out;
}

/**
 * Description of a failed request.
 *
 * @property status - HTTP status, absent for network-level failures.
 * @property body - Response body rendered as text, when the server sent one.
 */
export interface HttpFailure {
  readonly status?: number;
  readonly message: string;
  readonly body?: string;
}

function renderBody(data: unknown): string | undefined {
  if (data === undefined || data === null || data === "") {
    return undefined;
  }
  return typeof data === "string" ? data : JSON.stringify(data);
}

export function describeHttpError(cause: unknown): HttpFailure {
  if (axios.isAxiosError(cause)) {
    const status = cause.response?.status;
    if (status !== undefined) {
      const statusText = cause.response?.statusText;
      const data: unknown = cause.response?.data;
      return {
        status,
        message: `HTTP ${status}${statusText ? ` ${statusText}` : ""}`,
        body: renderBody(data)
      };
    }
    return { message: `${cause.code ?? "network error"}: ${cause.message}` };
  }
  if (cause instanceof Error) {
    return { message: cause.message };
  }
  return { message: String(cause) };
}
