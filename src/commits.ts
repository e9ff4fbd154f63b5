// CHANGE: Look up last-commit dates for candidate paths through batched GraphQL queries.
// WHY: Only the already-filtered paths are queried, one aliased history field per path, so query cost stays bounded.

import { GitHubTransport, isRecord } from "./api.js";
import { GitHubApiError, throwIfCanceled } from "./errors.js";
import { debug } from "./logger.js";
import { FileCommitInfo, JsonValue, Repository } from "./types.js";

export const COMMIT_BATCH_SIZE = 100;

function alias(index: number): string {
  return `file${index}`;
}

/**
 * Build a compact query with one aliased `history(first: 1)` field per path.
 *
 * Formatted for reading, the query for two paths is:
 * ```graphql
 * {
 *   repository(owner: "octocat", name: "Hello-World") {
 *     object(expression: "main") {
 *       ... on Commit {
 *         file0: history(first: 1, path: "README.md") { nodes { committedDate } }
 *         file1: history(first: 1, path: "src/app.ts") { nodes { committedDate } }
 *       }
 *     }
 *   }
 * }
 * ```
 */
export function buildFileHistoryQuery(owner: string, name: string, ref: string, paths: readonly string[]): string {
  const quote = (value: string): string => JSON.stringify(value);
  const fields = paths
    .map((path, index) => `${alias(index)}:history(first:1,path:${quote(path)}){nodes{committedDate}}`)
    .join("");
  return `{repository(owner:${quote(owner)},name:${quote(name)}){object(expression:${quote(ref)}){...on Commit{${fields}}}}}`;
}

function extractCommitDates(data: JsonValue, repository: Repository, batch: readonly string[]): FileCommitInfo[] {
  if (!isRecord(data) || !isRecord(data.repository)) {
    throw new GitHubApiError("not_found", `repository ${repository.fullName} not found`);
  }
  const target = data.repository.object;
  if (!isRecord(target)) {
    throw new GitHubApiError("not_found", `ref ${repository.ref} not found in ${repository.fullName}`);
  }
  const results: FileCommitInfo[] = [];
  batch.forEach((path, index) => {
    const history = target[alias(index)];
    if (!isRecord(history) || !Array.isArray(history.nodes)) {
      return;
    }
    const [latest] = history.nodes;
    if (!isRecord(latest) || typeof latest.committedDate !== "string") {
      return;
    }
    const committedDate = new Date(latest.committedDate);
    if (!Number.isNaN(committedDate.getTime())) {
      results.push({ path, committedDate });
    }
  });
  return results;
}

/**
 * Fetch the last commit date of each path, in input order.
 *
 * Paths without commit history are omitted. Any failed batch fails the whole call.
 */
export async function fetchCommitDates(
  transport: GitHubTransport,
  repository: Repository,
  paths: readonly string[],
  signal?: AbortSignal,
  batchSize = COMMIT_BATCH_SIZE
): Promise<FileCommitInfo[]> {
  const results: FileCommitInfo[] = [];
  for (let start = 0; start < paths.length; start += batchSize) {
    throwIfCanceled(signal);
    const batch = paths.slice(start, start + batchSize);
    const query = buildFileHistoryQuery(repository.owner, repository.name, repository.ref, batch);
    const data = await transport.queryCommitHistory(query, signal);
    results.push(...extractCommitDates(data, repository, batch));
  }
  debug(`Commit dates for ${repository.fullName}: ${results.length}/${paths.length} paths have history`);
  return results;
}
