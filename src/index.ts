#!/usr/bin/env node
// CHANGE: Delegate execution to the CLI runner and re-export the library surface.
// WHY: Importing the package must not parse argv; only direct execution runs the command.
// SOURCE: internal reasoning

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { GitHubClient, type GitHubTransport } from "./api.js";
export { Finder, validateSearchOptions } from "./finder.js";
export { applyEntryFilters } from "./filters.js";
export { compilePattern, match } from "./pattern.js";
export { parseRepositorySpec } from "./resolver.js";
export { Output } from "./output.js";
export * from "./errors.js";
export type * from "./types.js";
