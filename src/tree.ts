// CHANGE: Fetch recursive repository trees and classify their entries.
// WHY: One request per repository yields every path; truncation is reported to the caller instead of failing.

import { GitHubTransport } from "./api.js";
import { FileType, RawTreeEntry, Repository, TreeEntry, TreeResponse } from "./types.js";

/**
 * Classify a tree entry by its Git mode. Unknown modes are regular files.
 */
export function parseFileType(mode: string): FileType {
  switch (mode) {
    case "040000":
      return "directory";
    case "120000":
      return "symlink";
    case "160000":
      return "submodule";
    case "100755":
      return "executable";
    case "100644":
    case "100664":
      return "file";
    default:
      return "file";
  }
}

export function toTreeEntry(raw: RawTreeEntry): TreeEntry {
  return {
    path: raw.path,
    mode: raw.mode,
    sha: raw.sha,
    size: raw.size ?? 0,
    type: parseFileType(raw.mode)
  };
}

/**
 * Fetch the full recursive tree of a repository at its resolved ref.
 *
 * A truncated response still carries the partial entry list.
 */
export async function fetchTree(
  transport: GitHubTransport,
  repository: Repository,
  signal?: AbortSignal
): Promise<TreeResponse> {
  const tree = await transport.getTree(repository.owner, repository.name, repository.ref, signal);
  return {
    entries: tree.tree.map(toTreeEntry),
    truncated: tree.truncated
  };
}
