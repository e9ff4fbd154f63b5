// CHANGE: Confirm HTTP helpers retry transient failures and map statuses onto typed errors.
// WHY: The search core relies on error kinds to decide between warnings and fatal errors.
// SOURCE: internal reasoning

import { AxiosError, AxiosHeaders, AxiosResponse, CanceledError as AxiosCanceledError } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CanceledError, GitHubApiError } from "../src/errors.js";
import { createHttpClient, getJson, postJson, toApiError } from "../src/utils/http.js";
import { JsonValue } from "../src/types.js";

function response(status: number, data: JsonValue, headers: Record<string, string> = {}, statusText = ""): AxiosResponse<JsonValue> {
  return { status, statusText, data, headers, config: { headers: new AxiosHeaders() } };
}

function failure(status: number, data: JsonValue, headers: Record<string, string> = {}, statusText = ""): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", undefined, undefined, response(status, data, headers, statusText));
}

describe("createHttpClient", () => {
  it("sends GitHub headers and a bearer token", () => {
    const client = createHttpClient({ baseURL: "https://api.github.com", token: "test-secret" });
    expect(client.defaults.baseURL).toBe("https://api.github.com");
    expect(client.defaults.headers.Authorization).toBe("Bearer test-secret");
    expect(client.defaults.headers.Accept).toBe("application/vnd.github+json");
  });

  it("stays anonymous without a token", () => {
    const client = createHttpClient({ baseURL: "https://git.example.test/api/v3" });
    expect(client.defaults.headers.Authorization).toBeUndefined();
  });
});

describe("getJson", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("retries on 5xx responses", async () => {
    const client = createHttpClient({ baseURL: "https://api.github.com" });
    const spy = vi.spyOn(client, "get");
    spy.mockRejectedValueOnce(failure(502, null, {}, "Bad Gateway"));
    spy.mockResolvedValueOnce(response(200, { value: "ok" }, { etag: "abc" }));

    const result = await getJson<JsonValue>(client, "/data", "failed to load data");

    expect(result).toEqual({ data: { value: "ok" }, headers: { etag: "abc" }, status: 200 });
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("gives up after three attempts", async () => {
    vi.useFakeTimers();
    const client = createHttpClient({ baseURL: "https://api.github.com" });
    const spy = vi.spyOn(client, "get").mockRejectedValue(failure(503, { message: "Service Unavailable" }));

    const pending = getJson<JsonValue>(client, "/data", "failed to load data");
    const outcome = expect(pending).rejects.toMatchObject({
      kind: "server",
      status: 503,
      message: "failed to load data: 503 Service Unavailable"
    });
    await vi.advanceTimersByTimeAsync(1500);
    await outcome;
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it("does not retry client errors", async () => {
    const client = createHttpClient({ baseURL: "https://api.github.com" });
    const spy = vi.spyOn(client, "get").mockRejectedValue(failure(404, { message: "Not Found" }));

    await expect(getJson(client, "/repos/a/b", "failed to get repo a/b")).rejects.toThrow(
      "failed to get repo a/b: 404 Not Found"
    );
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe("postJson", () => {
  it("posts the body to the given URL", async () => {
    const client = createHttpClient({ baseURL: "https://api.github.com" });
    const spy = vi.spyOn(client, "post").mockResolvedValue(response(200, { data: { ok: true } }));

    const result = await postJson<JsonValue>(client, "https://api.github.com/graphql", { query: "{viewer{login}}" }, "query");

    expect(result.data).toEqual({ data: { ok: true } });
    expect(spy).toHaveBeenCalledWith("https://api.github.com/graphql", { query: "{viewer{login}}" }, { signal: undefined });
  });
});

describe("toApiError", () => {
  it.each([
    [404, { message: "Not Found" }, {}, "not_found", "op: 404 Not Found"],
    [401, { message: "Bad credentials" }, {}, "forbidden", "op: 401 Bad credentials"],
    [403, { message: "Resource not accessible" }, { "x-ratelimit-remaining": "12" }, "forbidden", "op: 403 Resource not accessible"],
    [422, { message: "Validation Failed" }, {}, "invalid", "op: 422 Validation Failed"],
    [500, null, {}, "server", "op: 500 Internal Server Error"]
  ] as const)("maps status %i", (status, data, headers, kind, message) => {
    const error = toApiError(failure(status, data, headers, "Internal Server Error"), "op");
    expect(error).toBeInstanceOf(GitHubApiError);
    expect(error).toMatchObject({ kind, status, message });
  });

  it("recognises exhausted rate limits", () => {
    const error = toApiError(
      failure(403, { message: "API rate limit exceeded" }, { "x-ratelimit-remaining": "0", "x-ratelimit-reset": "1700000000" }),
      "failed to list repos for acme"
    );
    expect(error).toMatchObject({
      kind: "rate_limited",
      message: "failed to list repos for acme: API rate limit exceeded (resets at 2023-11-14T22:13:20.000Z)"
    });
  });

  it("treats 429 as a rate limit", () => {
    expect(toApiError(failure(429, null), "op")).toMatchObject({ kind: "rate_limited", message: "op: API rate limit exceeded" });
  });

  it("maps missing responses to network errors", () => {
    const error = toApiError(new AxiosError("timeout of 30000ms exceeded", "ECONNABORTED"), "op");
    expect(error).toMatchObject({ kind: "network", message: "op: timeout of 30000ms exceeded" });
  });

  it("maps aborted requests to cancellation", () => {
    expect(toApiError(new AxiosCanceledError("canceled"), "op")).toBeInstanceOf(CanceledError);
  });
});
