// CHANGE: Implement the per-repository entry filter pipeline.
// WHY: Every stage is a stable, non-mutating transform so surviving entries keep their tree order.
// SOURCE: internal reasoning

import path from "path";
import { compilePattern } from "./pattern.js";
import { FileCommitInfo, FileType, SearchOptions, TreeEntry } from "./types.js";

/**
 * Subset of search options consumed by the synchronous filter stages.
 */
export type EntryFilterOptions = Pick<
  SearchOptions,
  "pattern" | "fileTypes" | "extensions" | "excludes" | "minSize" | "maxSize" | "ignoreCase" | "fullPath"
>;

/**
 * Normalise an extension to exactly one leading dot.
 *
 * @example
 * ```typescript
 * normalizeExtension("go");   // ".go"
 * normalizeExtension("..md"); // ".md"
 * ```
 */
export function normalizeExtension(extension: string): string {
  return `.${extension.replace(/^\.+/, "")}`;
}

/**
 * Final extension of a slash-separated path, including its dot, or "" when the last segment has none.
 */
export function extensionOf(entryPath: string): string {
  const base = path.posix.basename(entryPath);
  const dot = base.lastIndexOf(".");
  return dot === -1 ? "" : base.slice(dot);
}

function matchTarget(entryPath: string, fullPath: boolean): string {
  return fullPath ? entryPath : path.posix.basename(entryPath);
}

export function filterByType(entries: readonly TreeEntry[], types: readonly FileType[]): TreeEntry[] {
  if (types.length === 0) {
    return [...entries];
  }
  const wanted = new Set(types);
  return entries.filter(entry => wanted.has(entry.type));
}

export function filterByExtension(
  entries: readonly TreeEntry[],
  extensions: readonly string[],
  ignoreCase: boolean
): TreeEntry[] {
  if (extensions.length === 0) {
    return [...entries];
  }
  const wanted = new Set(
    extensions.map(extension => {
      const normalized = normalizeExtension(extension);
      return ignoreCase ? normalized.toLowerCase() : normalized;
    })
  );
  return entries.filter(entry => {
    const extension = extensionOf(ignoreCase ? entry.path.toLowerCase() : entry.path);
    return extension !== "" && wanted.has(extension);
  });
}

/**
 * Keep entries within the inclusive size range; a bound of 0 is open.
 */
export function filterBySize(entries: readonly TreeEntry[], minSize: number, maxSize: number): TreeEntry[] {
  if (minSize === 0 && maxSize === 0) {
    return [...entries];
  }
  return entries.filter(entry => {
    if (minSize > 0 && entry.size < minSize) {
      return false;
    }
    return !(maxSize > 0 && entry.size > maxSize);
  });
}

/**
 * Keep entries whose basename (or full path) matches the pattern.
 *
 * @throws PatternError when the pattern is malformed.
 */
export function filterByPattern(
  entries: readonly TreeEntry[],
  pattern: string,
  fullPath: boolean,
  ignoreCase: boolean
): TreeEntry[] {
  const matches = compilePattern(pattern, ignoreCase);
  return entries.filter(entry => matches(matchTarget(entry.path, fullPath)));
}

/**
 * Drop entries matching any exclude pattern.
 *
 * @throws PatternError when an exclude pattern is malformed.
 */
export function filterByExcludes(
  entries: readonly TreeEntry[],
  excludes: readonly string[],
  fullPath: boolean,
  ignoreCase: boolean
): TreeEntry[] {
  if (excludes.length === 0) {
    return [...entries];
  }
  const matchers = excludes.map(exclude => compilePattern(exclude, ignoreCase));
  return entries.filter(entry => {
    const target = matchTarget(entry.path, fullPath);
    return !matchers.some(excluded => excluded(target));
  });
}

/**
 * Keep entries whose last commit falls within the inclusive date range.
 *
 * Entries without a known commit date never satisfy a date constraint and are dropped.
 */
export function filterByCommitDate(
  entries: readonly TreeEntry[],
  commits: readonly FileCommitInfo[],
  changedAfter: Date | undefined,
  changedBefore: Date | undefined
): TreeEntry[] {
  if (!changedAfter && !changedBefore) {
    return [...entries];
  }
  const dates = new Map(commits.map(commit => [commit.path, commit.committedDate.getTime()]));
  return entries.filter(entry => {
    const committed = dates.get(entry.path);
    if (committed === undefined) {
      return false;
    }
    if (changedAfter && committed < changedAfter.getTime()) {
      return false;
    }
    return !(changedBefore && committed > changedBefore.getTime());
  });
}

/**
 * Run the synchronous stages in order: type, extension, size, pattern, exclude.
 *
 * @throws PatternError when the pattern or an exclude pattern is malformed.
 */
export function applyEntryFilters(entries: readonly TreeEntry[], options: EntryFilterOptions): TreeEntry[] {
  let filtered = filterByType(entries, options.fileTypes);
  filtered = filterByExtension(filtered, options.extensions, options.ignoreCase);
  filtered = filterBySize(filtered, options.minSize, options.maxSize);
  filtered = filterByPattern(filtered, options.pattern, options.fullPath, options.ignoreCase);
  return filterByExcludes(filtered, options.excludes, options.fullPath, options.ignoreCase);
}
