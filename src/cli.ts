// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: Flags are parsed into one immutable SearchOptions value; the search core never sees commander or globals.
// SOURCE: internal reasoning

import { supportsColor } from "chalk";
import { Command, InvalidArgumentError, Option } from "commander";
import { setMaxListeners } from "events";
import { GitHubClient } from "./api.js";
import { ResponseCache } from "./cache.js";
import { CACHE, GITHUB, SEARCH } from "./config.js";
import { CanceledError, ConfigurationError, describeError } from "./errors.js";
import { Finder, MAX_JOBS } from "./finder.js";
import { normalizeExtension } from "./filters.js";
import { debug, error as logError, setVerbose } from "./logger.js";
import { Output } from "./output.js";
import { FileType, REPO_TYPES, RepoType, RepoTypeSet, SearchOptions } from "./types.js";
import { createHttpClient } from "./utils/http.js";
import { parseByteSize } from "./utils/size.js";
import { parseDuration, parseTimeOrDuration } from "./utils/time.js";

export type OutputMode = "auto" | "always" | "never";

/**
 * Parsed command-line flags, as produced by commander.
 */
export interface CliFlags {
  readonly ignoreCase?: boolean;
  readonly fullPath?: boolean;
  readonly type: readonly FileType[];
  readonly extension: readonly string[];
  readonly exclude: readonly string[];
  readonly minSize?: number;
  readonly maxSize?: number;
  readonly changedWithin?: number;
  readonly changedAfter?: Date;
  readonly changedBefore?: Date;
  readonly repoTypes: RepoTypeSet;
  readonly color: OutputMode;
  readonly hyperlink: OutputMode;
  readonly jobs: number;
  readonly cache: boolean;
  readonly cacheDir: string;
  readonly cacheTtl: number;
  readonly debug?: boolean;
}

export type SearchRunner = (pattern: string, repositories: readonly string[], flags: CliFlags) => Promise<void>;

export const DEFAULT_REPO_TYPES: RepoTypeSet = {
  sources: true,
  forks: false,
  archives: false,
  mirrors: false,
  all: false
};

const FILE_TYPE_ALIASES: Record<string, FileType> = {
  f: "file",
  file: "file",
  d: "directory",
  dir: "directory",
  directory: "directory",
  l: "symlink",
  symlink: "symlink",
  x: "executable",
  executable: "executable",
  s: "submodule",
  submodule: "submodule"
};

function isRepoType(value: string): value is RepoType {
  return REPO_TYPES.some(type => type === value);
}

export function parseFileTypeFlag(value: string, previous: readonly FileType[]): readonly FileType[] {
  const type = FILE_TYPE_ALIASES[value];
  if (type === undefined) {
    throw new InvalidArgumentError(`must be one of ${Object.keys(FILE_TYPE_ALIASES).join(", ")}`);
  }
  return previous.includes(type) ? previous : [...previous, type];
}

export function parseExtensionFlag(value: string, previous: readonly string[]): readonly string[] {
  return [...previous, normalizeExtension(value)];
}

function collect(value: string, previous: readonly string[]): readonly string[] {
  return [...previous, value];
}

/**
 * Parse a comma-separated list of sources, forks, archives, mirrors or `all`.
 */
export function parseRepoTypes(value: string): RepoTypeSet {
  const selected = { sources: false, forks: false, archives: false, mirrors: false, all: false };
  for (const part of value.split(",").map(item => item.trim())) {
    if (part === "") {
      continue;
    }
    if (part === "all") {
      return { sources: true, forks: true, archives: true, mirrors: true, all: true };
    }
    if (!isRepoType(part)) {
      throw new InvalidArgumentError(`invalid repo type "${part}": must be one of ${REPO_TYPES.join(", ")}, or all`);
    }
    selected[part] = true;
  }
  return selected;
}

export function parseJobs(value: string): number {
  const jobs = Number(value);
  if (!Number.isInteger(jobs) || jobs < 1 || jobs > MAX_JOBS) {
    throw new InvalidArgumentError(`must be between 1 and ${MAX_JOBS}`);
  }
  return jobs;
}

export function parseSizeFlag(value: string): number {
  let size: number;
  try {
    size = parseByteSize(value);
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
  if (size <= 0) {
    throw new InvalidArgumentError("must be greater than 0");
  }
  return size;
}

function parseDurationFlag(value: string): number {
  try {
    return parseDuration(value);
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
}

function parseTimeFlag(value: string): Date {
  try {
    return parseTimeOrDuration(value);
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
}

/**
 * Split positional arguments into a pattern and repository selectors.
 *
 * A single argument is a repository searched with `*`; otherwise the first argument is the pattern.
 */
export function parseArgs(args: readonly string[]): { readonly pattern: string; readonly repositories: readonly string[] } {
  if (args.length === 0) {
    throw new ConfigurationError("at least one repository is required");
  }
  if (args.length === 1) {
    return { pattern: "*", repositories: [...args] };
  }
  const [pattern, ...repositories] = args;
  return { pattern: pattern === "" ? "*" : pattern, repositories };
}

/**
 * Assemble the immutable search configuration.
 *
 * @throws ConfigurationError when `--changed-within` is combined with `--changed-after`.
 */
export function buildSearchOptions(
  pattern: string,
  repositories: readonly string[],
  flags: CliFlags,
  now: Date = new Date()
): SearchOptions {
  if (flags.changedWithin !== undefined && flags.changedAfter !== undefined) {
    throw new ConfigurationError("--changed-within cannot be combined with --changed-after");
  }
  const changedAfter =
    flags.changedWithin !== undefined ? new Date(now.getTime() - flags.changedWithin) : flags.changedAfter;
  return {
    pattern,
    repositories,
    repoTypes: flags.repoTypes,
    fileTypes: flags.type,
    ignoreCase: flags.ignoreCase ?? false,
    fullPath: flags.fullPath ?? false,
    extensions: flags.extension,
    excludes: flags.exclude,
    minSize: flags.minSize ?? 0,
    maxSize: flags.maxSize ?? 0,
    changedAfter,
    changedBefore: flags.changedBefore,
    jobs: flags.jobs
  };
}

/**
 * Decide color and hyperlink output; hyperlinks in `auto` mode need colors and a terminal.
 */
export function resolveTerminalFeatures(
  color: OutputMode,
  hyperlink: OutputMode,
  isTerminal: boolean,
  colorSupported: boolean = supportsColor !== false
): { readonly colorize: boolean; readonly hyperlinks: boolean } {
  const colorize = color === "always" || (color === "auto" && isTerminal && colorSupported);
  const hyperlinks = hyperlink === "always" || (hyperlink === "auto" && isTerminal && colorize);
  return { colorize, hyperlinks };
}

/**
 * Abort listeners a run may register on its signal at once.
 */
export function abortListenerBudget(jobs: number): number {
  return 2 * jobs + 1;
}

/**
 * Search entry point: wire the GitHub client, output sink and interrupt handling around the finder.
 */
export async function runSearch(pattern: string, repositories: readonly string[], flags: CliFlags): Promise<void> {
  if (flags.debug) {
    setVerbose(true);
  }
  const options = buildSearchOptions(pattern, repositories, flags);
  const { colorize, hyperlinks } = resolveTerminalFeatures(flags.color, flags.hyperlink, Boolean(process.stdout.isTTY));
  const cache = new ResponseCache({ dir: flags.cacheDir, ttlMs: flags.cacheTtl, enabled: flags.cache });
  const transport = new GitHubClient({
    http: createHttpClient({ baseURL: GITHUB.API_URL, token: GITHUB.TOKEN }),
    graphqlUrl: GITHUB.GRAPHQL_URL,
    cache
  });
  const output = new Output({ stdout: process.stdout, stderr: process.stderr, host: GITHUB.HOST, colorize, hyperlinks });

  const controller = new AbortController();
  // Each admitted task holds one gate listener and one in-flight request listener.
  setMaxListeners(abortListenerBudget(options.jobs), controller.signal);
  const interrupt = (): void => controller.abort();
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);
  try {
    const summary = await new Finder({ transport, output }).find(options, controller.signal);
    debug(
      `Search complete: ${summary.matches} matches in ${summary.repositories} repositories (${summary.failed} failed).`
    );
  } finally {
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
  }
}

/**
 * Construct commander program with configured flags.
 *
 * @param run - Search implementation invoked by the action, replaceable in tests.
 */
export function buildProgram(run: SearchRunner = runSearch): Command {
  const program = new Command();
  program
    .name("repo-glob")
    .description("Find files across GitHub repositories by glob pattern")
    .version("1.0.0")
    .argument("<args...>", "[pattern] followed by repositories: owner, owner/repo or owner/repo@ref")
    .option("-i, --ignore-case", "case-insensitive pattern matching")
    .option("-p, --full-path", "match pattern against full path")
    .option(
      "-t, --type <type>",
      "filter by file type: f/file, d/dir/directory, l/symlink, x/executable, s/submodule",
      parseFileTypeFlag,
      []
    )
    .option("-e, --extension <ext>", "filter by file extension (repeatable)", parseExtensionFlag, [])
    .option("-E, --exclude <pattern>", "exclude pattern (repeatable)", collect, [])
    .option("--min-size <size>", "minimum file size (e.g. 1M, 500k)", parseSizeFlag)
    .option("--max-size <size>", "maximum file size (e.g. 5M, 1GB)", parseSizeFlag)
    .option("--changed-within <duration>", "last commit within duration (e.g. 2weeks, 10h)", parseDurationFlag)
    .option("--changed-after <time>", "last commit after time or duration ago", parseTimeFlag)
    .option("--changed-before <time>", "last commit before time or duration ago", parseTimeFlag)
    .addOption(
      new Option("--repo-types <types>", "repo types when expanding owners (sources,forks,archives,mirrors,all)")
        .argParser(parseRepoTypes)
        .default(DEFAULT_REPO_TYPES, "sources")
    )
    .addOption(new Option("-c, --color <mode>", "colorize output").choices(["auto", "always", "never"]).default("auto"))
    .addOption(new Option("--hyperlink <mode>", "hyperlink output").choices(["auto", "always", "never"]).default("auto"))
    .option("-j, --jobs <count>", "maximum concurrent repository searches", parseJobs, SEARCH.DEFAULT_JOBS)
    .option("--no-cache", "bypass cache, always fetch fresh data")
    .option("--cache-dir <dir>", "override cache directory location", CACHE.DIR)
    .option("--cache-ttl <duration>", "cache time-to-live (e.g. 1h, 2d)", parseDurationFlag, CACHE.TTL_MS)
    .option("--debug", "log HTTP, cache and pipeline details")
    .action(async (args: string[], flags: CliFlags) => {
      const { pattern, repositories } = parseArgs(args);
      await run(pattern, repositories, flags);
    });
  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * Exit status is 1 for fatal errors and 130 for an interrupted run; warnings never change it.
 */
export async function runCli(argv: readonly string[], run: SearchRunner = runSearch): Promise<void> {
  const program = buildProgram(run);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CanceledError) {
      logError("Search canceled.");
      process.exitCode = 130;
      return;
    }
    logError(describeError(error));
    process.exitCode = 1;
  }
}
