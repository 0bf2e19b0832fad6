import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

/**
 * Stored cache entry
 */
interface CacheEntry {
  timestamp: string;
  data: unknown;
}

export interface ResponseCacheOptions {
  /** Directory holding one JSON file per key */
  cacheDir: string;
  /** How long entries stay valid */
  ttlHours?: number;
  /** Clock override for tests */
  now?: () => Date;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "data" in value
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Time-based file cache for API responses.
 *
 * Missing, expired and corrupt entries all count as misses; the caller
 * refetches and overwrites them.
 */
export class ResponseCache {
  private readonly cacheDir: string;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: ResponseCacheOptions) {
    const { cacheDir, ttlHours = 1, now = () => new Date() } = options;
    this.cacheDir = cacheDir;
    this.ttlMs = ttlHours * 60 * 60 * 1000;
    this.now = now;
  }

  private pathFor(key: string): string {
    return join(this.cacheDir, `${key}.json`);
  }

  private async readEntry(key: string): Promise<CacheEntry | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), "utf-8");
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return isCacheEntry(parsed) ? parsed : undefined;
    } catch (error) {
      if (error instanceof SyntaxError) return undefined; // corrupt file, refetch
      throw error;
    }
  }

  private isFresh(entry: CacheEntry): boolean {
    const cachedAt = Date.parse(entry.timestamp);
    if (Number.isNaN(cachedAt)) return false;
    return this.now().getTime() - cachedAt < this.ttlMs;
  }

  /**
   * Check whether a key has a fresh entry
   */
  async isValid(key: string): Promise<boolean> {
    const entry = await this.readEntry(key);
    return entry !== undefined && this.isFresh(entry);
  }

  /**
   * Cached payload for a key, or undefined on a miss
   */
  async get(key: string): Promise<unknown> {
    const entry = await this.readEntry(key);
    if (!entry || !this.isFresh(entry)) return undefined;
    return entry.data;
  }

  /**
   * Store a payload stamped with the current time
   */
  async set(key: string, data: unknown): Promise<void> {
    await mkdir(this.cacheDir, { recursive: true });
    const entry: CacheEntry = { timestamp: this.now().toISOString(), data };
    await writeFile(this.pathFor(key), JSON.stringify(entry, null, 2), "utf-8");
  }

  async invalidate(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  /**
   * Remove every cached entry
   */
  async clearAll(): Promise<void> {
    let files: string[];
    try {
      files = await readdir(this.cacheDir);
    } catch (error) {
      if (isNotFound(error)) return;
      throw error;
    }
    await Promise.all(
      files.filter((f) => f.endsWith(".json")).map((f) => rm(join(this.cacheDir, f), { force: true }))
    );
  }
}
