import fs from "fs";
import path from "path";
import { errorCode, errorMessage } from "./errors";
import { logger } from "./logger";

const fsp = fs.promises;

const CACHE_FORMAT_VERSION = 1;

type CacheEntry = [mtimeMs: number, hash: string];

interface CacheFile {
  version: number;
  entries: Record<string, CacheEntry>;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "number" &&
    typeof value[1] === "string"
  );
}

function parseCacheFile(raw: string): Map<string, CacheEntry> {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== "object" || data === null || !("version" in data) || !("entries" in data)) {
    throw new Error("cache root is not a cache object");
  }

  const { version, entries } = data;
  if (version !== CACHE_FORMAT_VERSION) {
    throw new Error(`unsupported cache version: ${String(version)}`);
  }
  if (typeof entries !== "object" || entries === null) {
    throw new Error("cache entries missing");
  }

  const result = new Map<string, CacheEntry>();
  for (const [filePath, entry] of Object.entries(entries)) {
    if (!isCacheEntry(entry)) {
      throw new Error(`malformed entry for ${filePath}`);
    }
    result.set(filePath, entry);
  }
  return result;
}

/**
 * Persistent map of absolute file path → (modification time, full hash).
 *
 * A stored hash is trusted only while the file's mtime is exactly the one it
 * was stored with. Nothing here is a correctness dependency: a missing or
 * corrupt file loads as an empty cache, and a failed flush leaves the
 * in-memory map authoritative for the rest of the process.
 *
 * Construct without a file path for a memory-only cache.
 */
export class HashCache {
  private readonly entries = new Map<string, CacheEntry>();
  private dirty = false;

  constructor(readonly filePath?: string) {}

  get size(): number {
    return this.entries.size;
  }

  async load(): Promise<void> {
    if (!this.filePath) {
      return;
    }

    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, "utf8");
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        logger.warn(`Error reading hash cache: ${this.filePath}: ${errorMessage(err)}`);
      }
      return;
    }

    try {
      const loaded = parseCacheFile(raw);
      this.entries.clear();
      for (const [filePath, entry] of loaded) {
        this.entries.set(filePath, entry);
      }
      this.dirty = false;
      logger.info(`Hash cache loaded: ${this.entries.size} entries`);
    } catch (err) {
      logger.warn(`Ignoring corrupt hash cache: ${this.filePath}: ${errorMessage(err)}`);
    }
  }

  /** Returns the cached hash when `mtimeMs` matches the stored one exactly. */
  lookup(filePath: string, mtimeMs: number): string | undefined {
    const entry = this.entries.get(filePath);
    if (!entry || entry[0] !== mtimeMs) {
      return undefined;
    }
    return entry[1];
  }

  store(filePath: string, mtimeMs: number, hash: string): void {
    this.entries.set(filePath, [mtimeMs, hash]);
    this.dirty = true;
  }

  /**
   * Overwrites the cache file with the full mapping. Writes go to a sibling
   * temp file first and are renamed into place.
   */
  async flush(): Promise<void> {
    if (!this.filePath || !this.dirty) {
      return;
    }

    const payload: CacheFile = {
      version: CACHE_FORMAT_VERSION,
      entries: Object.fromEntries(this.entries)
    };
    const tmpPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`
    );

    try {
      await fsp.writeFile(tmpPath, JSON.stringify(payload), "utf8");
      await fsp.rename(tmpPath, this.filePath);
      this.dirty = false;
      logger.debug(`Hash cache saved: ${this.entries.size} entries`);
    } catch (err) {
      logger.warn(`Error saving hash cache: ${this.filePath}: ${errorMessage(err)}`);
      await fsp.rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        logger.debug(`Leftover cache temp file: ${tmpPath}: ${errorMessage(rmErr)}`);
      });
    }
  }
}
