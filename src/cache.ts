// CHANGE: Persist decoded API responses on disk with a time-to-live.
// WHY: Repeated searches over the same owners reuse listings and trees instead of spending rate limit.
// SOURCE: internal reasoning

import { randomUUID } from "crypto";
import fs from "fs-extra";
import path from "path";
import { CACHE } from "./config.js";
import { describeError } from "./errors.js";
import { debug } from "./logger.js";
import { JsonValue } from "./types.js";
import { sha256 } from "./utils/hashing.js";

/**
 * On-disk record wrapping one cached response.
 *
 * @property key - Request key, kept to detect hash collisions.
 * @property storedAt - Epoch milliseconds of the write.
 */
interface CacheRecord {
  readonly version: number;
  readonly key: string;
  readonly storedAt: number;
  readonly data: JsonValue;
}

/**
 * @property dir - Directory holding one JSON file per request key.
 * @property ttlMs - Maximum age of a usable entry.
 * @property enabled - When false every lookup misses and nothing is written.
 */
export interface ResponseCacheOptions {
  readonly dir: string;
  readonly ttlMs: number;
  readonly enabled: boolean;
}

function isCacheRecord(value: unknown): value is CacheRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "version" in value &&
    typeof value.version === "number" &&
    "key" in value &&
    typeof value.key === "string" &&
    "storedAt" in value &&
    typeof value.storedAt === "number" &&
    "data" in value
  );
}

/**
 * Response cache with atomic writes.
 */
export class ResponseCache {
  constructor(
    private readonly options: ResponseCacheOptions,
    private readonly now: () => number = Date.now
  ) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  private fileFor(key: string): string {
    return path.join(this.options.dir, `${sha256(key)}.json`);
  }

  /**
   * Look up a fresh entry.
   *
   * @returns Cached payload, or undefined on miss, expiry or unreadable entry.
   */
  async get(key: string): Promise<JsonValue | undefined> {
    if (!this.options.enabled) {
      return undefined;
    }
    const file = this.fileFor(key);
    if (!(await fs.pathExists(file))) {
      return undefined;
    }
    try {
      const parsed: unknown = await fs.readJson(file);
      if (!isCacheRecord(parsed) || parsed.version !== CACHE.VERSION || parsed.key !== key) {
        debug(`Cache entry for ${key} has unexpected shape, ignoring.`);
        return undefined;
      }
      if (this.now() - parsed.storedAt > this.options.ttlMs) {
        debug(`Cache entry for ${key} expired.`);
        return undefined;
      }
      debug(`Cache hit for ${key}`);
      return parsed.data;
    } catch (error) {
      debug(`Cache read failed for ${key} (${describeError(error)}), ignoring entry.`);
      return undefined;
    }
  }

  /**
   * Store a payload by writing to a temporary file before rename.
   *
   * Write failures are logged and leave the previous entry in place.
   */
  async set(key: string, data: JsonValue): Promise<void> {
    if (!this.options.enabled) {
      return;
    }
    const file = this.fileFor(key);
    const record: CacheRecord = { version: CACHE.VERSION, key, storedAt: this.now(), data };
    const tempPath = `${file}.${randomUUID()}.tmp`;
    try {
      await fs.ensureDir(this.options.dir);
      await fs.writeJson(tempPath, record);
      await fs.move(tempPath, file, { overwrite: true });
    } catch (error) {
      debug(`Cache write failed for ${key}: ${describeError(error)}`);
      await fs.remove(tempPath);
    }
  }
}
