// CHANGE: Define strongly typed domain models for the repository search pipeline.
// WHY: Closed unions for file and repository kinds keep every classifier exhaustive at compile time.
// SOURCE: internal reasoning

/**
 * JSON-like value type used for decoded API payloads without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * JSON object as returned by `isRecord`.
 */
export type JsonRecord = { readonly [key: string]: JsonValue };

/**
 * Account kind reported by `GET /users/{name}`.
 */
export type OwnerType = "User" | "Organization";

/**
 * Classification of a tree entry derived from its Git mode.
 */
export type FileType = "file" | "directory" | "symlink" | "executable" | "submodule";

export const FILE_TYPES: readonly FileType[] = ["file", "directory", "symlink", "executable", "submodule"];

/**
 * One dimension of the repository type selector.
 */
export type RepoType = "sources" | "forks" | "archives" | "mirrors";

export const REPO_TYPES: readonly RepoType[] = ["sources", "forks", "archives", "mirrors"];

/**
 * Kind of a repository ignoring its archived flag.
 */
export type RepoKind = "source" | "fork" | "mirror";

/**
 * Selector applied when an owner is expanded into its repositories.
 *
 * Invariant: `archives` narrows the selected kinds to archived repositories and selects nothing on its own;
 * only `all` admits every non-empty repository regardless of kind and archive state.
 */
export interface RepoTypeSet {
  readonly sources: boolean;
  readonly forks: boolean;
  readonly archives: boolean;
  readonly mirrors: boolean;
  readonly all: boolean;
}

/**
 * Parsed repository selector.
 *
 * @property owner - User or organization login.
 * @property repo - Repository name, empty when every repository of the owner is requested.
 * @property ref - Branch, tag or SHA, empty for the default branch.
 */
export interface RepositorySpec {
  readonly owner: string;
  readonly repo: string;
  readonly ref: string;
}

/**
 * Repository resolved from API metadata, ready to be searched.
 */
export interface Repository {
  readonly owner: string;
  readonly name: string;
  readonly fullName: string;
  readonly ref: string;
  readonly fork: boolean;
  readonly archived: boolean;
  readonly mirror: boolean;
  readonly size: number;
}

/**
 * Repository payload as returned by the REST listing and lookup endpoints.
 */
export interface RawRepository {
  readonly name: string;
  readonly full_name: string;
  readonly owner: { readonly login: string };
  readonly default_branch?: string;
  readonly size: number;
  readonly fork: boolean;
  readonly archived: boolean;
  readonly mirror_url?: string;
}

/**
 * Tree node as returned by the Git trees endpoint.
 */
export interface RawTreeEntry {
  readonly path: string;
  readonly mode: string;
  readonly type: string;
  readonly sha: string;
  readonly size?: number;
}

export interface RawTree {
  readonly sha: string;
  readonly tree: readonly RawTreeEntry[];
  readonly truncated: boolean;
}

/**
 * Immutable tree entry snapshot with its derived file type.
 */
export interface TreeEntry {
  readonly path: string;
  readonly mode: string;
  readonly sha: string;
  readonly size: number;
  readonly type: FileType;
}

export interface TreeResponse {
  readonly entries: readonly TreeEntry[];
  readonly truncated: boolean;
}

/**
 * Last commit date known for a path.
 */
export interface FileCommitInfo {
  readonly path: string;
  readonly committedDate: Date;
}

/**
 * Full search configuration, assembled once before the run and never mutated.
 *
 * @property pattern - Glob matched against basenames, or full paths when `fullPath` is set.
 * @property repositories - Raw repository selectors (`owner`, `owner/repo`, `owner/repo@ref`).
 * @property minSize - Inclusive lower size bound in bytes, 0 for none.
 * @property maxSize - Inclusive upper size bound in bytes, 0 for none.
 * @property jobs - Maximum number of repositories searched at once.
 */
export interface SearchOptions {
  readonly pattern: string;
  readonly repositories: readonly string[];
  readonly repoTypes: RepoTypeSet;
  readonly fileTypes: readonly FileType[];
  readonly ignoreCase: boolean;
  readonly fullPath: boolean;
  readonly extensions: readonly string[];
  readonly excludes: readonly string[];
  readonly minSize: number;
  readonly maxSize: number;
  readonly changedAfter?: Date;
  readonly changedBefore?: Date;
  readonly jobs: number;
}

/**
 * Outcome of a completed run.
 *
 * @property repositories - Number of distinct repositories scheduled.
 * @property failed - Number of repositories whose search ended in error.
 * @property matches - Number of emitted matches.
 */
export interface SearchSummary {
  readonly repositories: number;
  readonly failed: number;
  readonly matches: number;
}
