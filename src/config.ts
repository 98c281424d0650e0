import path from "path";

export const CACHE_FILE_NAME = ".dupsift-cache.json";
export const CSV_FILE_NAME = "duplicates.csv";

/** Leading byte window sampled for the quick hash. */
export const QUICK_HASH_WINDOW = 4096;

/** Read size used while streaming a file through the full hash. */
export const FULL_HASH_CHUNK_SIZE = 64 * 1024;

/** The hash cache is checkpointed after this many processed candidates. */
export const CACHE_CHECKPOINT_INTERVAL = 50;

const BYTES_PER_MEGABYTE = 1024 * 1024;

/**
 * Normalizes a user-supplied extension filter so it always carries a leading dot.
 * Blank input means "no filter".
 *
 * @example
 * normalizeExtension("jpg");   // ".jpg"
 * normalizeExtension(" .txt "); // ".txt"
 * normalizeExtension("");      // undefined
 */
export function normalizeExtension(extension?: string): string | undefined {
  const trimmed = extension?.trim();
  if (!trimmed) {
    return undefined;
  }
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/** Converts a minimum size given in megabytes to whole bytes. Non-positive values disable the filter. */
export function megabytesToBytes(megabytes: number): number {
  if (!Number.isFinite(megabytes) || megabytes <= 0) {
    return 0;
  }
  return Math.floor(megabytes * BYTES_PER_MEGABYTE);
}

export function defaultCachePath(): string {
  return path.resolve(CACHE_FILE_NAME);
}
