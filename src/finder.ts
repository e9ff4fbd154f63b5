// CHANGE: Orchestrate resolution and per-repository searches under a bounded admission gate.
// WHY: One repository's failure must only produce a warning; the run fails only when every repository failed.
// SOURCE: internal reasoning

import { GitHubTransport } from "./api.js";
import { fetchCommitDates } from "./commits.js";
import {
  CanceledError,
  ConfigurationError,
  PatternError,
  SearchFailedError,
  describeError,
  throwIfCanceled
} from "./errors.js";
import { applyEntryFilters, filterByCommitDate } from "./filters.js";
import { debug } from "./logger.js";
import { Output } from "./output.js";
import { validatePattern } from "./pattern.js";
import { dedupeRepositories, parseRepositorySpec, resolveRepositories } from "./resolver.js";
import { fetchTree } from "./tree.js";
import { Repository, SearchOptions, SearchSummary } from "./types.js";
import { AdmissionGate } from "./utils/gate.js";

export const MAX_JOBS = 100;

/**
 * Lifecycle of one repository search; transitions are strictly sequential.
 */
export type TaskState = "queued" | "fetching" | "filtering" | "enriching" | "emitting" | "done";

type TaskOutcome =
  | { readonly status: "done"; readonly matches: number }
  | { readonly status: "failed" }
  | { readonly status: "canceled" };

export interface FinderDependencies {
  readonly transport: GitHubTransport;
  readonly output: Output;
}

/**
 * Reject configurations that can never run, before any request is made.
 *
 * @throws ConfigurationError describing the first problem found.
 */
export function validateSearchOptions(options: SearchOptions): void {
  if (!Number.isInteger(options.jobs) || options.jobs < 1 || options.jobs > MAX_JOBS) {
    throw new ConfigurationError(`jobs must be between 1 and ${MAX_JOBS}`);
  }
  if (options.repositories.length === 0) {
    throw new ConfigurationError("at least one repository is required");
  }
  if (options.minSize < 0 || options.maxSize < 0) {
    throw new ConfigurationError("size bounds cannot be negative");
  }
  if (options.minSize > 0 && options.maxSize > 0 && options.minSize > options.maxSize) {
    throw new ConfigurationError("minimum size cannot be greater than maximum size");
  }
  if (options.changedAfter && options.changedBefore && options.changedAfter.getTime() > options.changedBefore.getTime()) {
    throw new ConfigurationError("changed-after cannot be later than changed-before");
  }
  try {
    validatePattern(options.pattern);
    options.excludes.forEach(validatePattern);
  } catch (error) {
    if (error instanceof PatternError) {
      throw new ConfigurationError(error.message);
    }
    throw error;
  }
}

/**
 * Searches many repositories concurrently and streams matches to the output sink.
 */
export class Finder {
  private readonly transport: GitHubTransport;
  private readonly output: Output;

  constructor(dependencies: FinderDependencies) {
    this.transport = dependencies.transport;
    this.output = dependencies.output;
  }

  /**
   * Run a complete search.
   *
   * @throws ConfigurationError before any request when the options are invalid.
   * @throws SearchFailedError when every scheduled repository failed.
   * @throws CanceledError when the signal fired; output already written is kept.
   */
  async find(options: SearchOptions, signal?: AbortSignal): Promise<SearchSummary> {
    validateSearchOptions(options);
    const gate = new AdmissionGate(options.jobs);

    const repositories = await this.resolveAll(options, gate, signal);
    if (repositories.length === 0) {
      this.output.info("No repositories match the filter");
      return { repositories: 0, failed: 0, matches: 0 };
    }
    debug(`Searching ${repositories.length} repositories with ${options.jobs} jobs`);

    const outcomes = await Promise.all(
      repositories.map(repository => {
        this.transition(repository, "queued");
        return gate.run(() => this.searchRepository(repository, options, signal), signal).then(
          (matches): TaskOutcome => ({ status: "done", matches }),
          (error: unknown) => this.recordFailure(repository, error)
        );
      })
    );
    throwIfCanceled(signal);

    let failed = 0;
    let matches = 0;
    for (const outcome of outcomes) {
      if (outcome.status === "failed") {
        failed += 1;
      } else if (outcome.status === "done") {
        matches += outcome.matches;
      }
    }
    if (failed === repositories.length) {
      throw new SearchFailedError(repositories.length);
    }
    return { repositories: repositories.length, failed, matches };
  }

  /**
   * Resolve every selector, skipping the ones that fail, and deduplicate by full name.
   */
  private async resolveAll(options: SearchOptions, gate: AdmissionGate, signal?: AbortSignal): Promise<Repository[]> {
    const resolved = await Promise.all(
      options.repositories.map(async input => {
        try {
          const spec = parseRepositorySpec(input);
          return await gate.run(() => resolveRepositories(this.transport, spec, options.repoTypes, signal), signal);
        } catch (error) {
          if (error instanceof CanceledError) {
            throw error;
          }
          this.output.warning(`${input}: ${describeError(error)}`);
          return [];
        }
      })
    );
    const repositories = dedupeRepositories(resolved.flat());
    debug(`Resolved ${repositories.length} distinct repositories from ${options.repositories.length} selectors`);
    return repositories;
  }

  private recordFailure(repository: Repository, error: unknown): TaskOutcome {
    if (error instanceof CanceledError) {
      return { status: "canceled" };
    }
    this.output.warning(`${repository.fullName}: ${describeError(error)}`);
    return { status: "failed" };
  }

  private transition(repository: Repository, state: TaskState): void {
    debug(`${repository.fullName}: ${state}`);
  }

  /**
   * Fetch, filter, optionally enrich, and emit one repository.
   *
   * @returns Number of emitted matches.
   */
  private async searchRepository(repository: Repository, options: SearchOptions, signal?: AbortSignal): Promise<number> {
    this.transition(repository, "fetching");
    const tree = await fetchTree(this.transport, repository, signal);
    if (tree.truncated) {
      this.output.warning(`${repository.fullName}: exceeds GitHub's API limit (100k files or 7MB) - results are incomplete`);
    }

    this.transition(repository, "filtering");
    let entries = applyEntryFilters(tree.entries, options);

    if ((options.changedAfter || options.changedBefore) && entries.length > 0) {
      this.transition(repository, "enriching");
      const commits = await fetchCommitDates(
        this.transport,
        repository,
        entries.map(entry => entry.path),
        signal
      );
      entries = filterByCommitDate(entries, commits, options.changedAfter, options.changedBefore);
    }

    throwIfCanceled(signal);
    this.transition(repository, "emitting");
    for (const entry of entries) {
      this.output.match(repository, entry.path);
    }
    this.transition(repository, "done");
    return entries.length;
  }
}
