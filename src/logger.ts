// CHANGE: Write diagnostics to stderr with an opt-in debug channel.
// WHY: Standard output is reserved for matches; debug detail is enabled by --debug or REPO_GLOB_DEBUG.
// SOURCE: internal reasoning

import chalk from "chalk";

let verbose = process.env.REPO_GLOB_DEBUG === "1" || process.env.REPO_GLOB_DEBUG === "true";

/**
 * Toggle debug output for the rest of the process.
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/**
 * HTTP retries, cache hits, pagination and per-stage counts. Silent unless verbose.
 */
export function debug(message: string): void {
  if (verbose) {
    console.error(chalk.gray(`[DEBUG] ${message}`));
  }
}

export function error(message: string): void {
  console.error(chalk.red(`[ERROR] ${message}`));
}
