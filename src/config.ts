// CHANGE: Centralise configuration source with environment defaults.
// WHY: The CLI copies these values into immutable search and client options; the search core never reads them.
// SOURCE: internal reasoning

import * as dotenv from "dotenv";
import os from "os";
import path from "path";

dotenv.config();

const host = process.env.GH_HOST?.trim() || "github.com";

/**
 * GitHub endpoints and credentials.
 *
 * Invariant: `API_URL` and `GRAPHQL_URL` always target the same host as `HOST`.
 */
export const GITHUB = {
  HOST: host,
  TOKEN: process.env.GH_TOKEN ?? process.env.GITHUB_TOKEN ?? "",
  API_URL: host === "github.com" ? "https://api.github.com" : `https://${host}/api/v3`,
  GRAPHQL_URL: host === "github.com" ? "https://api.github.com/graphql" : `https://${host}/api/graphql`
} as const;

/**
 * Network-level configuration for HTTP operations.
 */
export const NET = {
  TIMEOUT: Number.parseInt(process.env.HTTP_TIMEOUT ?? "30000", 10),
  RETRY_ATTEMPTS: 3,
  RETRY_BASE_DELAY_MS: 500
} as const;

/**
 * Response cache settings.
 */
export const CACHE = {
  DIR: process.env.REPO_GLOB_CACHE_DIR?.trim() || path.join(os.homedir(), ".cache", "repo-glob"),
  TTL_MS: 24 * 60 * 60 * 1000,
  VERSION: 1
} as const;

/**
 * Search defaults applied by the CLI when no flag overrides them.
 */
export const SEARCH = {
  DEFAULT_JOBS: Number.parseInt(process.env.REPO_GLOB_JOBS ?? "10", 10)
} as const;
