// CHANGE: Confirm CLI flags are parsed into search options and failures map onto exit codes.
// WHY: The command line is the only place where user input is converted into the immutable configuration.
// SOURCE: internal reasoning

import { InvalidArgumentError } from "commander";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CliFlags,
  DEFAULT_REPO_TYPES,
  SearchRunner,
  buildProgram,
  buildSearchOptions,
  parseArgs,
  parseFileTypeFlag,
  parseJobs,
  parseRepoTypes,
  parseSizeFlag,
  resolveTerminalFeatures,
  runCli
} from "../src/cli.js";
import { SEARCH } from "../src/config.js";
import { CanceledError, ConfigurationError, SearchFailedError } from "../src/errors.js";

const baseFlags: CliFlags = {
  type: [],
  extension: [],
  exclude: [],
  repoTypes: DEFAULT_REPO_TYPES,
  color: "never",
  hyperlink: "never",
  jobs: 10,
  cache: true,
  cacheDir: "/tmp/repo-glob-test",
  cacheTtl: 60_000
};

describe("parseArgs", () => {
  it("searches everything when only a repository is given", () => {
    expect(parseArgs(["cli/cli"])).toEqual({ pattern: "*", repositories: ["cli/cli"] });
  });

  it("takes the first of several arguments as the pattern", () => {
    expect(parseArgs(["*.go", "cli/cli", "octocat"])).toEqual({ pattern: "*.go", repositories: ["cli/cli", "octocat"] });
  });

  it("replaces an empty pattern with a wildcard", () => {
    expect(parseArgs(["", "cli"])).toEqual({ pattern: "*", repositories: ["cli"] });
  });
});

describe("flag parsers", () => {
  it("accumulates file types by alias without duplicates", () => {
    expect(parseFileTypeFlag("d", parseFileTypeFlag("x", []))).toEqual(["executable", "directory"]);
    expect(parseFileTypeFlag("file", ["file"])).toEqual(["file"]);
    expect(() => parseFileTypeFlag("socket", [])).toThrow(InvalidArgumentError);
  });

  it("parses repository type lists", () => {
    expect(parseRepoTypes("forks, archives")).toEqual({
      sources: false,
      forks: true,
      archives: true,
      mirrors: false,
      all: false
    });
    expect(parseRepoTypes("sources,all")).toEqual({ sources: true, forks: true, archives: true, mirrors: true, all: true });
    expect(() => parseRepoTypes("templates")).toThrow(
      'invalid repo type "templates": must be one of sources, forks, archives, mirrors, or all'
    );
  });

  it("bounds the job count", () => {
    expect(parseJobs("100")).toBe(100);
    expect(() => parseJobs("0")).toThrow("must be between 1 and 100");
    expect(() => parseJobs("2.5")).toThrow(InvalidArgumentError);
  });

  it("requires positive sizes", () => {
    expect(parseSizeFlag("1k")).toBe(1024);
    expect(() => parseSizeFlag("0")).toThrow("must be greater than 0");
    expect(() => parseSizeFlag("1x")).toThrow('unknown unit "x"');
  });
});

describe("buildSearchOptions", () => {
  const now = new Date("2024-01-15T00:00:00Z");

  it("copies flags and applies defaults", () => {
    expect(buildSearchOptions("*.go", ["cli"], { ...baseFlags, ignoreCase: true, minSize: 10 }, now)).toEqual({
      pattern: "*.go",
      repositories: ["cli"],
      repoTypes: DEFAULT_REPO_TYPES,
      fileTypes: [],
      ignoreCase: true,
      fullPath: false,
      extensions: [],
      excludes: [],
      minSize: 10,
      maxSize: 0,
      changedAfter: undefined,
      changedBefore: undefined,
      jobs: 10
    });
  });

  it("turns changed-within into a lower date bound", () => {
    const options = buildSearchOptions("*", ["cli"], { ...baseFlags, changedWithin: 7 * 24 * 60 * 60 * 1000 }, now);
    expect(options.changedAfter?.toISOString()).toBe("2024-01-08T00:00:00.000Z");
  });

  it("refuses changed-within together with changed-after", () => {
    expect(() =>
      buildSearchOptions("*", ["cli"], { ...baseFlags, changedWithin: 1000, changedAfter: now }, now)
    ).toThrow(ConfigurationError);
  });
});

describe("resolveTerminalFeatures", () => {
  it.each([
    ["auto", "auto", true, true, { colorize: true, hyperlinks: true }],
    ["auto", "auto", false, true, { colorize: false, hyperlinks: false }],
    ["auto", "auto", true, false, { colorize: false, hyperlinks: false }],
    ["always", "never", false, false, { colorize: true, hyperlinks: false }],
    ["never", "always", false, true, { colorize: false, hyperlinks: true }]
  ] as const)("color=%s hyperlink=%s terminal=%s", (color, hyperlink, terminal, supported, expected) => {
    expect(resolveTerminalFeatures(color, hyperlink, terminal, supported)).toEqual(expected);
  });
});

describe("CLI program", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it("passes parsed flags to the search", async () => {
    const run = vi.fn<SearchRunner>(async () => undefined);

    await buildProgram(run).parseAsync([
      "node",
      "repo-glob",
      "-i",
      "-t",
      "f",
      "-e",
      "go",
      "-E",
      "vendor/**",
      "--repo-types",
      "forks",
      "-j",
      "3",
      "--no-cache",
      "--min-size",
      "1k",
      "*.go",
      "cli/cli",
      "cli"
    ]);

    expect(run).toHaveBeenCalledTimes(1);
    const [pattern, repositories, flags] = run.mock.calls[0] ?? [];
    expect(pattern).toBe("*.go");
    expect(repositories).toEqual(["cli/cli", "cli"]);
    expect(flags).toMatchObject({
      ignoreCase: true,
      type: ["file"],
      extension: [".go"],
      exclude: ["vendor/**"],
      repoTypes: { sources: false, forks: true, archives: false, mirrors: false, all: false },
      jobs: 3,
      cache: false,
      minSize: 1024,
      color: "auto",
      hyperlink: "auto"
    });
  });

  it("applies defaults when no flag is given", async () => {
    const run = vi.fn<SearchRunner>(async () => undefined);

    await buildProgram(run).parseAsync(["node", "repo-glob", "octocat"]);

    const [pattern, repositories, flags] = run.mock.calls[0] ?? [];
    expect(pattern).toBe("*");
    expect(repositories).toEqual(["octocat"]);
    expect(flags).toMatchObject({ repoTypes: DEFAULT_REPO_TYPES, jobs: SEARCH.DEFAULT_JOBS, cache: true });
  });

  it("exits with status 1 when the search fails", async () => {
    const logSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await runCli(["node", "repo-glob", "acme"], async () => {
      throw new SearchFailedError(2);
    });

    expect(process.exitCode).toBe(1);
    expect(String(logSpy.mock.calls[0]?.[0])).toContain("[ERROR] failed to search all 2 repositories");
  });

  it("exits with status 130 when interrupted", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    await runCli(["node", "repo-glob", "acme"], async () => {
      throw new CanceledError();
    });

    expect(process.exitCode).toBe(130);
  });
});
