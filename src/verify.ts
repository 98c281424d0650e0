import fs from "fs";
import path from "path";
import { HashCache } from "./cache";
import { errorMessage } from "./errors";
import { fullHash, quickHash } from "./hash";
import { logger } from "./logger";
import { DuplicatePair, FileRecord } from "./types";

const fsp = fs.promises;

export type HashFunction = (filePath: string) => Promise<string>;

/**
 * Whole-file hashing backed by the hash cache.
 *
 * The file's mtime is read first; a cache entry with the same mtime is
 * returned without touching the content. Otherwise the file is streamed and
 * the result stored.
 */
export class FullHashVerifier {
  constructor(
    private readonly cache: HashCache,
    private readonly hashFile: HashFunction = fullHash
  ) {}

  /** Full hash of the file, or null when it cannot be read (logged). */
  async hash(record: FileRecord): Promise<string | null> {
    if (record.fullHash) {
      return record.fullHash;
    }

    let mtimeMs: number;
    try {
      mtimeMs = (await fsp.stat(record.filePath)).mtimeMs;
    } catch (err) {
      logger.error(`Error getting modification time for file: ${record.filePath}: ${errorMessage(err)}`);
      return null;
    }
    record.mtimeMs = mtimeMs;

    const cached = this.cache.lookup(record.filePath, mtimeMs);
    if (cached !== undefined) {
      record.fullHash = cached;
      return cached;
    }

    try {
      const hash = await this.hashFile(record.filePath);
      this.cache.store(record.filePath, mtimeMs, hash);
      record.fullHash = hash;
      return hash;
    } catch (err) {
      logger.error(`Error reading file for full hash: ${record.filePath}: ${errorMessage(err)}`);
      return null;
    }
  }
}

/**
 * Decides which of two content-identical files is kept.
 *
 * The file whose parent directory path sorts first, compared case-insensitively,
 * is the original. Only the immediate parent path is compared, never the file
 * name or depth. On a tie the existing file stays the original.
 */
export function pickOriginal(existing: string, incoming: string): DuplicatePair {
  const existingDir = path.dirname(existing).toLowerCase();
  const incomingDir = path.dirname(incoming).toLowerCase();
  if (incomingDir < existingDir) {
    return { duplicate: existing, original: incoming };
  }
  return { duplicate: incoming, original: existing };
}

/**
 * First-seen representative of one full-hash value within a bucket. Its path
 * moves to whichever file becomes the canonical original.
 */
interface Anchor {
  record: FileRecord;
}

export type Classification =
  | { kind: "duplicate"; pair: DuplicatePair }
  | { kind: "anchor" }
  | { kind: "skipped" };

/**
 * Anchors indexed by (size, quick hash).
 *
 * Each incoming candidate is quick-hashed and compared against the anchors of
 * its bucket. Full hashes are computed lazily: an anchor pays for its full read
 * the first time something is compared with it, and the result is kept for the
 * life of the index. Within a bucket at most one anchor exists per full hash.
 */
export class DuplicateIndex {
  private readonly buckets = new Map<string, Anchor[]>();

  constructor(
    private readonly verifier: FullHashVerifier,
    private readonly quickHashFile: HashFunction = (filePath) => quickHash(filePath)
  ) {}

  async classify(record: FileRecord): Promise<Classification> {
    try {
      record.quickHash = await this.quickHashFile(record.filePath);
    } catch (err) {
      logger.error(`Error reading file for quick hash: ${record.filePath}: ${errorMessage(err)}`);
      return { kind: "skipped" };
    }

    const key = `${record.size}:${record.quickHash}`;
    const bucket = this.buckets.get(key) ?? [];
    if (!this.buckets.has(key)) {
      this.buckets.set(key, bucket);
    }

    for (const anchor of [...bucket]) {
      const anchorHash = await this.verifier.hash(anchor.record);
      if (anchorHash === null) {
        bucket.splice(bucket.indexOf(anchor), 1);
        continue;
      }

      const ownHash = await this.verifier.hash(record);
      if (ownHash === null) {
        return { kind: "skipped" };
      }

      if (ownHash === anchorHash) {
        const pair = pickOriginal(anchor.record.filePath, record.filePath);
        if (pair.original === record.filePath) {
          anchor.record = record;
        }
        return { kind: "duplicate", pair };
      }
    }

    bucket.push({ record });
    return { kind: "anchor" };
  }
}
