// CHANGE: Parse durations and timestamps for the commit-date flags.
// WHY: Users write `2weeks` or `2024-01-15`; the search core only receives absolute dates.

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

const UNITS: Record<string, number> = {
  s: SECOND,
  m: MINUTE,
  h: HOUR,
  d: DAY,
  day: DAY,
  days: DAY,
  w: WEEK,
  week: WEEK,
  weeks: WEEK
};

/**
 * Parse a single-unit duration such as `10h`, `2d` or `3weeks` into milliseconds.
 *
 * Combined (`1h30m`), fractional and negative durations are rejected.
 */
export function parseDuration(input: string): number {
  const text = input.trim();
  if (text === "") {
    throw new Error("empty duration string");
  }
  const match = /^(\d+)\s*([a-z]+)$/.exec(text);
  if (!match) {
    throw new Error(`invalid duration "${text}" (expected a number followed by s, m, h, d or w)`);
  }
  const [, digits, unit] = match;
  const multiplier = UNITS[unit];
  if (multiplier === undefined) {
    throw new Error(`invalid duration "${text}": unknown unit "${unit}"`);
  }
  const value = Number.parseInt(digits, 10) * multiplier;
  if (!Number.isSafeInteger(value)) {
    throw new Error(`invalid duration "${text}": value too large`);
  }
  return value;
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const RFC3339 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

function utcDate(parts: readonly string[]): Date | undefined {
  const [year, month, day, hour = 0, minute = 0, second = 0] = parts.map(part => Number.parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls over out-of-range fields, so round-trip them to reject `2018-13-45`.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return date;
}

/**
 * Parse `YYYY-MM-DD` or `YYYY-MM-DD HH:MM:SS` (both UTC) or an RFC 3339 timestamp.
 */
export function parseTime(input: string): Date {
  const text = input.trim();
  const dateOnly = DATE_ONLY.exec(text) ?? DATE_TIME.exec(text);
  if (dateOnly) {
    const date = utcDate(dateOnly.slice(1));
    if (date) {
      return date;
    }
  } else if (RFC3339.test(text)) {
    const date = new Date(text);
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  throw new Error(`invalid time format "${input}" (expected YYYY-MM-DD, YYYY-MM-DD HH:MM:SS, or RFC3339)`);
}

/**
 * Parse an absolute time, or a duration meaning that long before `now`.
 */
export function parseTimeOrDuration(input: string, now: Date = new Date()): Date {
  try {
    return parseTime(input);
  } catch (timeError) {
    try {
      return new Date(now.getTime() - parseDuration(input));
    } catch {
      throw timeError;
    }
  }
}
