// CHANGE: Expand repository selectors into concrete repositories.
// WHY: Owners fan out into many repositories; explicit selectors resolve to exactly one and skip type filtering.
// SOURCE: internal reasoning

import { GitHubTransport } from "./api.js";
import { EmptyRepositoryError, InvalidRepositorySpecError, throwIfCanceled } from "./errors.js";
import { debug } from "./logger.js";
import { OwnerType, RawRepository, REPO_TYPES, RepoKind, RepoType, RepoTypeSet, Repository, RepositorySpec } from "./types.js";

export const DEFAULT_PAGE_SIZE = 100;

/**
 * Server-side `type` values per repository dimension and owner type. Missing pairs fall back to `all`.
 */
const SERVER_TYPE_HINTS: Partial<Record<RepoType, Partial<Record<OwnerType, string>>>> = {
  sources: { Organization: "sources", User: "owner" },
  forks: { Organization: "forks" }
};

/**
 * Parse `owner`, `owner/repo` or `owner/repo@ref`.
 *
 * @throws InvalidRepositorySpecError on any other shape.
 */
export function parseRepositorySpec(input: string): RepositorySpec {
  const at = input.indexOf("@");
  const selector = at === -1 ? input : input.slice(0, at);
  const ref = at === -1 ? "" : input.slice(at + 1);
  const parts = selector.split("/");
  if (parts.length > 2 || parts[0] === "") {
    throw new InvalidRepositorySpecError(input);
  }
  const [owner, repo = ""] = parts;
  if ((parts.length === 2 && repo === "") || (at !== -1 && (repo === "" || ref === ""))) {
    throw new InvalidRepositorySpecError(input);
  }
  return { owner, repo, ref };
}

export function classifyRepository(repository: Pick<Repository, "fork" | "mirror">): RepoKind {
  if (repository.fork) {
    return "fork";
  }
  return repository.mirror ? "mirror" : "source";
}

function kindSelected(kind: RepoKind, types: RepoTypeSet): boolean {
  switch (kind) {
    case "source":
      return types.sources;
    case "fork":
      return types.forks;
    case "mirror":
      return types.mirrors;
  }
}

/**
 * Decide whether an expanded repository belongs to the requested type set.
 *
 * Empty repositories never match and `all` matches every other one. Otherwise the repository's kind must be
 * selected; `archives` then keeps archived repositories of those kinds and its absence keeps active ones.
 */
export function matchesRepoTypes(repository: Repository, types: RepoTypeSet): boolean {
  if (repository.size === 0) {
    return false;
  }
  if (types.all) {
    return true;
  }
  if (!kindSelected(classifyRepository(repository), types)) {
    return false;
  }
  return types.archives ? repository.archived : !repository.archived;
}

/**
 * Server-side `type` parameter, used only when exactly one dimension is selected and the API supports it.
 */
export function repoTypeHint(types: RepoTypeSet, ownerType: OwnerType): string {
  if (types.all) {
    return "all";
  }
  const selected = REPO_TYPES.filter(type => types[type]);
  if (selected.length !== 1) {
    return "all";
  }
  return SERVER_TYPE_HINTS[selected[0]]?.[ownerType] ?? "all";
}

/**
 * Convert an API payload into a searchable repository.
 *
 * @param ref - Explicit ref; the default branch is used when empty.
 */
export function toRepository(raw: RawRepository, ref = ""): Repository {
  return {
    owner: raw.owner.login,
    name: raw.name,
    fullName: raw.full_name,
    ref: ref || raw.default_branch || "",
    fork: raw.fork,
    archived: raw.archived,
    mirror: raw.mirror_url !== undefined,
    size: raw.size
  };
}

/**
 * Fetch one explicitly named repository.
 *
 * @throws EmptyRepositoryError when the repository has no commits or no default branch.
 */
export async function resolveExplicit(
  transport: GitHubTransport,
  spec: RepositorySpec,
  signal?: AbortSignal
): Promise<Repository> {
  const raw = await transport.getRepository(spec.owner, spec.repo, signal);
  if (raw.size === 0 || raw.default_branch === undefined) {
    throw new EmptyRepositoryError(raw.full_name);
  }
  return toRepository(raw, spec.ref);
}

/**
 * Page through every repository of an owner and apply the type set client-side.
 */
export async function listOwnerRepositories(
  transport: GitHubTransport,
  owner: string,
  types: RepoTypeSet,
  signal?: AbortSignal,
  pageSize = DEFAULT_PAGE_SIZE
): Promise<Repository[]> {
  const ownerType = await transport.getOwnerType(owner, signal);
  const typeHint = repoTypeHint(types, ownerType);
  const collected: RawRepository[] = [];
  for (let page = 1; ; page += 1) {
    throwIfCanceled(signal);
    const batch = await transport.listRepositories(owner, ownerType, page, pageSize, typeHint, signal);
    collected.push(...batch);
    debug(`Listed page ${page} of ${owner} (${ownerType}, type=${typeHint}): ${batch.length} repositories`);
    if (batch.length < pageSize) {
      break;
    }
  }
  const repositories = collected
    .filter(raw => raw.default_branch !== undefined)
    .map(raw => toRepository(raw))
    .filter(repository => matchesRepoTypes(repository, types));
  debug(`Owner ${owner}: ${repositories.length}/${collected.length} repositories match the type filter`);
  return repositories;
}

/**
 * Resolve one selector into repositories.
 */
export async function resolveRepositories(
  transport: GitHubTransport,
  spec: RepositorySpec,
  types: RepoTypeSet,
  signal?: AbortSignal
): Promise<Repository[]> {
  if (spec.repo !== "") {
    return [await resolveExplicit(transport, spec, signal)];
  }
  return listOwnerRepositories(transport, spec.owner, types, signal);
}

/**
 * Drop repeated repositories by full name, keeping the first occurrence.
 */
export function dedupeRepositories(repositories: readonly Repository[]): Repository[] {
  const seen = new Set<string>();
  return repositories.filter(repository => {
    if (seen.has(repository.fullName)) {
      return false;
    }
    seen.add(repository.fullName);
    return true;
  });
}
