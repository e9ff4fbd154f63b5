// CHANGE: Provide SHA-256 hashing utility for response cache keys.
// WHY: Request URLs and GraphQL queries contain characters that are unsafe in file names.

import { createHash } from "crypto";

/**
 * Compute SHA-256 hash of provided text or buffer.
 *
 * @returns Hexadecimal SHA-256 digest.
 */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}
