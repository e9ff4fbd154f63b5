// CHANGE: Provide retrying HTTP utilities that map failures onto typed API errors.
// WHY: The search core only distinguishes failure kinds; status codes and retry policy stay in the transport.
// SOURCE: internal reasoning

import axios, { AxiosError, AxiosInstance, AxiosResponse } from "axios";
import { NET } from "../config.js";
import { CanceledError, GitHubApiError } from "../errors.js";
import { debug } from "../logger.js";

/**
 * Options used to construct an authenticated GitHub HTTP client.
 *
 * @property baseURL - REST API root, e.g. `https://api.github.com`.
 * @property token - Bearer token; requests are anonymous when empty.
 */
export interface HttpClientOptions {
  readonly baseURL: string;
  readonly token?: string;
  readonly timeout?: number;
}

export interface JsonResponse<T> {
  readonly data: T;
  readonly headers: Record<string, string>;
  readonly status: number;
}

/**
 * Create an axios instance preconfigured for the GitHub API.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const headers: Record<string, string> = {
    "User-Agent": "repo-glob/1.0",
    Accept: "application/vnd.github+json",
    "X-GitHub-Api-Version": "2022-11-28"
  };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout ?? NET.TIMEOUT,
    maxRedirects: 5,
    headers
  });
}

function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CanceledError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    function onAbort(): void {
      clearTimeout(timer);
      reject(new CanceledError());
    }
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

function isRetryable(error: AxiosError): boolean {
  const status = error.response?.status;
  const isNetworkIssue = error.code === "ECONNRESET" || error.code === "ETIMEDOUT" || error.code === "ECONNABORTED";
  const isRetryableStatus = typeof status === "number" && status >= 500 && status < 600;
  return isNetworkIssue || isRetryableStatus;
}

async function executeWithRetry<T>(
  operation: () => Promise<AxiosResponse<T>>,
  attempt: number,
  signal?: AbortSignal
): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (error) {
    const nextAttempt = attempt + 1;
    if (!axios.isAxiosError(error) || error.code === "ERR_CANCELED" || nextAttempt >= NET.RETRY_ATTEMPTS || !isRetryable(error)) {
      throw error;
    }
    const backoff = NET.RETRY_BASE_DELAY_MS * 2 ** attempt;
    debug(`HTTP retry (${nextAttempt}/${NET.RETRY_ATTEMPTS}) after ${backoff}ms for ${error.config?.url ?? "unknown-url"}`);
    await sleep(backoff, signal);
    return executeWithRetry(operation, nextAttempt, signal);
  }
}

function messageOf(data: unknown): string | undefined {
  if (typeof data === "object" && data !== null && "message" in data && typeof data.message === "string") {
    return data.message;
  }
  return undefined;
}

/**
 * Convert a thrown request failure into `GitHubApiError` or `CanceledError`.
 *
 * @param description - Operation prefix for the message, e.g. `failed to get repo cli/cli`.
 */
export function toApiError(error: unknown, description: string): Error {
  if (error instanceof CanceledError || axios.isCancel(error)) {
    return new CanceledError();
  }
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }
  const response = error.response;
  if (!response) {
    return new GitHubApiError("network", `${description}: ${error.message}`);
  }
  const status = response.status;
  const headers = normaliseHeaders(response.headers);
  const detail = messageOf(response.data) ?? (response.statusText || error.message);
  if (status === 429 || (status === 403 && headers["x-ratelimit-remaining"] === "0")) {
    const reset = Number.parseInt(headers["x-ratelimit-reset"] ?? "", 10);
    const resetNote = Number.isNaN(reset) ? "" : ` (resets at ${new Date(reset * 1000).toISOString()})`;
    return new GitHubApiError("rate_limited", `${description}: API rate limit exceeded${resetNote}`, status);
  }
  if (status === 401 || status === 403) {
    return new GitHubApiError("forbidden", `${description}: ${status} ${detail}`, status);
  }
  if (status === 404) {
    return new GitHubApiError("not_found", `${description}: ${status} ${detail}`, status);
  }
  if (status >= 500) {
    return new GitHubApiError("server", `${description}: ${status} ${detail}`, status);
  }
  return new GitHubApiError("invalid", `${description}: ${status} ${detail}`, status);
}

/**
 * Perform GET request expecting JSON payload.
 *
 * @throws GitHubApiError or CanceledError.
 */
export async function getJson<T>(
  client: AxiosInstance,
  url: string,
  description: string,
  signal?: AbortSignal
): Promise<JsonResponse<T>> {
  try {
    const response = await executeWithRetry(() => client.get<T>(url, { signal }), 0, signal);
    return {
      data: response.data,
      headers: normaliseHeaders(response.headers),
      status: response.status
    };
  } catch (error) {
    throw toApiError(error, description);
  }
}

/**
 * Perform POST request with a JSON body expecting JSON payload.
 *
 * @throws GitHubApiError or CanceledError.
 */
export async function postJson<T>(
  client: AxiosInstance,
  url: string,
  body: object,
  description: string,
  signal?: AbortSignal
): Promise<JsonResponse<T>> {
  try {
    const response = await executeWithRetry(() => client.post<T>(url, body, { signal }), 0, signal);
    return {
      data: response.data,
      headers: normaliseHeaders(response.headers),
      status: response.status
    };
  } catch (error) {
    throw toApiError(error, description);
  }
}
