// CHANGE: Implement the GitHub transport used by the search core.
// WHY: Centralises network logic, response caching and payload validation behind one narrow interface.
// SOURCE: internal reasoning

import { AxiosInstance } from "axios";
import { ResponseCache } from "./cache.js";
import { GitHubApiError, ApiErrorKind } from "./errors.js";
import { debug } from "./logger.js";
import { JsonRecord, JsonValue, OwnerType, RawRepository, RawTree, RawTreeEntry } from "./types.js";
import { sha256 } from "./utils/hashing.js";
import { getJson, postJson } from "./utils/http.js";
import { encodePath } from "./utils/url.js";

/**
 * Capabilities the search core needs from GitHub.
 *
 * Every call is one logical request that resolves with decoded data or rejects with `GitHubApiError` or
 * `CanceledError`. Retries, caching and authentication are the implementation's concern.
 */
export interface GitHubTransport {
  getOwnerType(name: string, signal?: AbortSignal): Promise<OwnerType>;
  listRepositories(
    owner: string,
    ownerType: OwnerType,
    page: number,
    pageSize: number,
    typeHint: string,
    signal?: AbortSignal
  ): Promise<RawRepository[]>;
  getRepository(owner: string, name: string, signal?: AbortSignal): Promise<RawRepository>;
  getTree(owner: string, name: string, ref: string, signal?: AbortSignal): Promise<RawTree>;
  queryCommitHistory(query: string, signal?: AbortSignal): Promise<JsonValue>;
}

export function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(context: string): GitHubApiError {
  return new GitHubApiError("invalid", `${context}: malformed response`);
}

export function decodeOwnerType(value: JsonValue, context: string): OwnerType {
  if (!isRecord(value) || typeof value.type !== "string") {
    throw malformed(context);
  }
  return value.type === "Organization" ? "Organization" : "User";
}

export function decodeRepository(value: JsonValue, context: string): RawRepository {
  if (
    !isRecord(value) ||
    typeof value.name !== "string" ||
    typeof value.full_name !== "string" ||
    !isRecord(value.owner) ||
    typeof value.owner.login !== "string"
  ) {
    throw malformed(context);
  }
  return {
    name: value.name,
    full_name: value.full_name,
    owner: { login: value.owner.login },
    default_branch: typeof value.default_branch === "string" && value.default_branch !== "" ? value.default_branch : undefined,
    size: typeof value.size === "number" ? value.size : 0,
    fork: value.fork === true,
    archived: value.archived === true,
    mirror_url: typeof value.mirror_url === "string" && value.mirror_url !== "" ? value.mirror_url : undefined
  };
}

function decodeTreeEntry(value: JsonValue, context: string): RawTreeEntry {
  if (
    !isRecord(value) ||
    typeof value.path !== "string" ||
    typeof value.mode !== "string" ||
    typeof value.type !== "string" ||
    typeof value.sha !== "string"
  ) {
    throw malformed(context);
  }
  return {
    path: value.path,
    mode: value.mode,
    type: value.type,
    sha: value.sha,
    size: typeof value.size === "number" ? value.size : undefined
  };
}

export function decodeTree(value: JsonValue, context: string): RawTree {
  if (!isRecord(value) || !Array.isArray(value.tree)) {
    throw malformed(context);
  }
  return {
    sha: typeof value.sha === "string" ? value.sha : "",
    tree: value.tree.map(entry => decodeTreeEntry(entry, context)),
    truncated: value.truncated === true
  };
}

const GRAPHQL_ERROR_KINDS: Record<string, ApiErrorKind> = {
  NOT_FOUND: "not_found",
  FORBIDDEN: "forbidden",
  RATE_LIMITED: "rate_limited"
};

/**
 * Unwrap a GraphQL envelope, turning its `errors` array into a typed error.
 */
export function unwrapGraphQL(value: JsonValue, context: string): JsonValue {
  if (!isRecord(value)) {
    throw malformed(context);
  }
  const errors = Array.isArray(value.errors) ? value.errors.filter(isRecord) : [];
  if (errors.length > 0) {
    const [first] = errors;
    const kind = typeof first.type === "string" ? (GRAPHQL_ERROR_KINDS[first.type] ?? "invalid") : "invalid";
    const message = typeof first.message === "string" ? first.message : "unknown GraphQL error";
    throw new GitHubApiError(kind, `${context}: ${message}`);
  }
  return value.data;
}

/**
 * @property http - Axios instance whose base URL is the REST API root.
 * @property graphqlUrl - Absolute GraphQL endpoint.
 * @property cache - Optional response cache for GET and GraphQL requests.
 */
export interface GitHubClientOptions {
  readonly http: AxiosInstance;
  readonly graphqlUrl: string;
  readonly cache?: ResponseCache;
}

/**
 * Cache identity of the credential an axios instance sends; responses differ per token.
 */
function credentialIdentity(http: AxiosInstance): string {
  const authorization = http.defaults.headers.Authorization;
  return typeof authorization === "string" && authorization !== "" ? sha256(authorization) : "anonymous";
}

/**
 * REST and GraphQL client for github.com and GitHub Enterprise hosts.
 *
 * Cache keys carry the absolute request URL and the credential identity, so hosts and tokens sharing one
 * cache directory never see each other's responses.
 */
export class GitHubClient implements GitHubTransport {
  private readonly http: AxiosInstance;
  private readonly graphqlUrl: string;
  private readonly cache?: ResponseCache;
  private readonly identity: string;

  constructor(options: GitHubClientOptions) {
    this.http = options.http;
    this.graphqlUrl = options.graphqlUrl;
    this.cache = options.cache;
    this.identity = credentialIdentity(options.http);
  }

  private async get(url: string, description: string, signal?: AbortSignal): Promise<JsonValue> {
    const key = `GET ${this.http.defaults.baseURL ?? ""}${url} ${this.identity}`;
    const cached = await this.cache?.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const response = await getJson<JsonValue>(this.http, url, description, signal);
    debug(`GET ${url} -> ${response.status}`);
    await this.cache?.set(key, response.data);
    return response.data;
  }

  async getOwnerType(name: string, signal?: AbortSignal): Promise<OwnerType> {
    const context = `failed to get owner type for ${name}`;
    const data = await this.get(`/users/${encodeURIComponent(name)}`, context, signal);
    return decodeOwnerType(data, context);
  }

  async listRepositories(
    owner: string,
    ownerType: OwnerType,
    page: number,
    pageSize: number,
    typeHint: string,
    signal?: AbortSignal
  ): Promise<RawRepository[]> {
    const context = `failed to list repos for ${owner}`;
    const base = ownerType === "Organization" ? "orgs" : "users";
    const url = `/${base}/${encodeURIComponent(owner)}/repos?type=${encodeURIComponent(typeHint)}&per_page=${pageSize}&page=${page}`;
    const data = await this.get(url, context, signal);
    if (!Array.isArray(data)) {
      throw malformed(context);
    }
    return data.map(item => decodeRepository(item, context));
  }

  async getRepository(owner: string, name: string, signal?: AbortSignal): Promise<RawRepository> {
    const context = `failed to get repo ${owner}/${name}`;
    const data = await this.get(`/repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`, context, signal);
    return decodeRepository(data, context);
  }

  async getTree(owner: string, name: string, ref: string, signal?: AbortSignal): Promise<RawTree> {
    const context = `failed to get tree for ${owner}/${name}`;
    const url = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}/git/trees/${encodePath(ref)}?recursive=1`;
    const data = await this.get(url, context, signal);
    return decodeTree(data, context);
  }

  async queryCommitHistory(query: string, signal?: AbortSignal): Promise<JsonValue> {
    const context = "failed to fetch file commit dates";
    const key = `POST ${this.graphqlUrl} ${this.identity} ${query}`;
    const cached = await this.cache?.get(key);
    if (cached !== undefined) {
      return unwrapGraphQL(cached, context);
    }
    const response = await postJson<JsonValue>(this.http, this.graphqlUrl, { query }, context, signal);
    debug(`POST ${this.graphqlUrl} -> ${response.status}`);
    const data = unwrapGraphQL(response.data, context);
    await this.cache?.set(key, response.data);
    return data;
  }
}
