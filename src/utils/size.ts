// CHANGE: Parse human-readable byte sizes for the size filter flags.
// WHY: Units use binary multipliers so `1k` equals the 1024-byte blobs GitHub reports.

const MULTIPLIERS: Record<string, number> = {
  "": 1,
  b: 1,
  k: 1024,
  kb: 1024,
  kib: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  mib: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
  gib: 1024 ** 3,
  t: 1024 ** 4,
  tb: 1024 ** 4,
  tib: 1024 ** 4,
  p: 1024 ** 5,
  pb: 1024 ** 5,
  pib: 1024 ** 5
};

/**
 * Parse `1024`, `500k`, `1M`, `2GiB` and similar into bytes.
 *
 * @throws Error on empty input, a missing or negative number, an unknown unit, or a value beyond
 * `Number.MAX_SAFE_INTEGER`.
 */
export function parseByteSize(input: string): number {
  const text = input.trim();
  if (text === "") {
    throw new Error("empty size string");
  }
  const match = /^(-?\d+)\s*([a-zA-Z]*)$/.exec(text);
  if (!match) {
    throw new Error(`invalid size "${input}"`);
  }
  const [, digits, rawUnit] = match;
  const value = Number.parseInt(digits, 10);
  if (value < 0) {
    throw new Error("size cannot be negative");
  }
  const unit = rawUnit.toLowerCase();
  const multiplier = MULTIPLIERS[unit];
  if (multiplier === undefined) {
    throw new Error(`unknown unit "${unit}" (supported: b, k, m, g, t, p)`);
  }
  const bytes = value * multiplier;
  if (!Number.isSafeInteger(bytes)) {
    throw new Error("size too large");
  }
  return bytes;
}
