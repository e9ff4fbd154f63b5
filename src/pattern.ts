// CHANGE: Compile glob patterns into anchored regular expressions.
// WHY: Patterns are validated once before the run and then evaluated against every tree entry of every repository.
// SOURCE: internal reasoning

import { PatternError } from "./errors.js";

/**
 * Compiled pattern predicate.
 */
export type Matcher = (path: string) => boolean;

const REGEXP_SPECIALS = /[.*+?^${}()|[\]\\/]/g;
const CLASS_SPECIALS = /[\\\]\[^-]/g;

function escapeRegExp(text: string): string {
  return text.replace(REGEXP_SPECIALS, "\\$&");
}

function escapeClassChar(char: string): string {
  return char.replace(CLASS_SPECIALS, "\\$&");
}

function isSegmentStart(source: string, index: number, depth: number): boolean {
  if (index === 0) {
    return true;
  }
  const previous = source[index - 1];
  return previous === "/" || (depth > 0 && (previous === "{" || previous === ","));
}

function isSegmentEnd(source: string, index: number, depth: number): boolean {
  if (index >= source.length) {
    return true;
  }
  const next = source[index];
  return next === "/" || (depth > 0 && (next === "," || next === "}"));
}

function closesSegment(source: string, index: number, depth: number): boolean {
  return isSegmentEnd(source, index, depth) && source[index] !== "/";
}

/**
 * Translate a character class starting at `start` (the `[`).
 *
 * @returns Regular expression fragment and the index just past the closing `]`.
 */
function translateClass(source: string, start: number, original: string): { readonly fragment: string; readonly next: number } {
  let index = start + 1;
  let negate = false;
  if (source[index] === "!" || source[index] === "^") {
    negate = true;
    index += 1;
  }
  let body = "";
  let first = true;
  while (index < source.length) {
    const char = source[index];
    if (char === "]" && !first) {
      // A negated class never matches the separator.
      return { fragment: negate ? `[^/${body}]` : `[${body}]`, next: index + 1 };
    }
    if (char === "\\") {
      const escaped = source[index + 1];
      if (escaped === undefined) {
        throw new PatternError(original, "trailing escape character");
      }
      body += escapeClassChar(escaped);
      index += 2;
    } else {
      body += char === "-" ? "-" : escapeClassChar(char);
      index += 1;
    }
    first = false;
  }
  throw new PatternError(original, "unclosed character class");
}

function translate(source: string, original: string): string {
  let out = "";
  let depth = 0;
  let index = 0;
  while (index < source.length) {
    const char = source[index];
    switch (char) {
      case "*": {
        let end = index;
        while (source[end] === "*") {
          end += 1;
        }
        const globstar = end - index > 1 && isSegmentStart(source, index, depth) && isSegmentEnd(source, end, depth);
        if (!globstar) {
          out += "[^/]*";
          index = end;
        } else if (source[end] === "/") {
          out += "(?:.*/)?";
          index = end + 1;
        } else {
          out += ".*";
          index = end;
        }
        break;
      }
      case "/":
        // `dir/**` also matches `dir` itself, at the end of the pattern or of a brace alternative.
        if (index > 0 && source.startsWith("/**", index) && closesSegment(source, index + 3, depth)) {
          out += "(?:/.*)?";
          index += 3;
        } else {
          out += "\\/";
          index += 1;
        }
        break;
      case "?":
        out += "[^/]";
        index += 1;
        break;
      case "[": {
        const { fragment, next } = translateClass(source, index, original);
        out += fragment;
        index = next;
        break;
      }
      case "{":
        depth += 1;
        out += "(?:";
        index += 1;
        break;
      case "}":
        if (depth > 0) {
          depth -= 1;
          out += ")";
        } else {
          out += "\\}";
        }
        index += 1;
        break;
      case ",":
        out += depth > 0 ? "|" : ",";
        index += 1;
        break;
      case "\\": {
        const escaped = source[index + 1];
        if (escaped === undefined) {
          throw new PatternError(original, "trailing escape character");
        }
        out += escapeRegExp(escaped);
        index += 2;
        break;
      }
      default:
        out += escapeRegExp(char);
        index += 1;
    }
  }
  if (depth > 0) {
    throw new PatternError(original, "unclosed brace");
  }
  return out;
}

/**
 * Compile a glob pattern into a reusable predicate.
 *
 * Supported syntax: `*`, `**` as a whole path component, `?`, `[abc]`, `[a-z]`, `[^abc]`/`[!abc]`, `{a,b}`
 * (nestable) and `\` escapes. With `ignoreCase` both pattern and candidate paths are lower-cased first.
 *
 * @throws PatternError when the pattern is malformed.
 *
 * @example
 * ```typescript
 * const isGo = compilePattern("**\/*.go");
 * isGo("cmd/tool.go"); // true
 * ```
 */
export function compilePattern(pattern: string, ignoreCase = false): Matcher {
  const source = ignoreCase ? pattern.toLowerCase() : pattern;
  if (source === "") {
    return path => path === "";
  }
  let regex: RegExp;
  try {
    regex = new RegExp(`^${translate(source, pattern)}$`, "s");
  } catch (error) {
    if (error instanceof PatternError) {
      throw error;
    }
    throw new PatternError(pattern, "invalid character range");
  }
  return path => regex.test(ignoreCase ? path.toLowerCase() : path);
}

/**
 * Match a single path against a glob pattern.
 *
 * @throws PatternError when the pattern is malformed.
 */
export function match(pattern: string, path: string, ignoreCase = false): boolean {
  return compilePattern(pattern, ignoreCase)(path);
}

/**
 * Validate a pattern without matching anything.
 *
 * @throws PatternError when the pattern is malformed.
 */
export function validatePattern(pattern: string): void {
  compilePattern(pattern);
}
