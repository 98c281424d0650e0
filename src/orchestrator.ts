import fs from "fs";
import path from "path";
import { HashCache } from "./cache";
import { CACHE_CHECKPOINT_INTERVAL } from "./config";
import { CsvAuditSink } from "./csv";
import { errorMessage, InputValidationError } from "./errors";
import { logger } from "./logger";
import { computeProgress, WalkProgress } from "./progress";
import { candidateFiles, collectSizeGroups } from "./scan";
import {
  AggregateReport,
  DuplicatePair,
  FindOptions,
  HistogramBucket,
  ProgressState,
  ScanEvent,
  ScanOptions,
  ScanStatistics,
  ScanStatus,
  StopCondition
} from "./types";
import { DuplicateIndex, FullHashVerifier, HashFunction } from "./verify";

const fsp = fs.promises;

const HISTOGRAM_BINS = 10;
const BYTES_PER_MEGABYTE = 1024 * 1024;

/**
 * Collaborators shared across scans. One cache must not be used by two scans
 * at the same time.
 */
export interface ScanContext {
  /** Loaded hash cache; a fresh memory-only cache when omitted */
  cache?: HashCache;
  /** Feedback during the eager directory walk */
  progress?: WalkProgress;
  /** Full-hash implementation, replaceable for instrumentation */
  hashFile?: HashFunction;
}

/**
 * Rejects a root that is missing, a symbolic link, or not a directory.
 *
 * @throws InputValidationError
 */
export async function ensureValidRoot(dirPath: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fsp.lstat(dirPath);
  } catch (err) {
    throw new InputValidationError(`Directory '${dirPath}' does not exist.`, {
      cause: errorMessage(err)
    });
  }

  if (stats.isSymbolicLink()) {
    throw new InputValidationError("Refusing to follow a symbolic link as the root directory.", {
      rootDir: dirPath
    });
  }

  if (!stats.isDirectory()) {
    throw new InputValidationError(`'${dirPath}' is not a directory.`, { rootDir: dirPath });
  }
}

export function isStopRequested(stop?: StopCondition): boolean {
  if (!stop) {
    return false;
  }
  return typeof stop === "function" ? stop() : stop.aborted;
}

/**
 * Streams a duplicate scan of one directory tree.
 *
 * The walk and size grouping run eagerly before the first event (`init`).
 * After that, exactly one `scanning` event follows each processed candidate,
 * and the stream ends with a single `stopped` or `finished` event. The
 * generator never runs ahead of its consumer.
 *
 * `options.stop` is polled before each candidate, so the file being hashed
 * always completes. The cache is flushed on stop, on finish, every
 * `checkpointInterval` processed files, and when the consumer leaves the
 * loop early.
 *
 * @throws InputValidationError before any event when the root is unusable
 *
 * @example
 * const controller = new AbortController();
 * for await (const event of scanDuplicates({ rootDir: '/data', stop: controller.signal })) {
 *   console.log(event.status, event.progress.percent);
 * }
 */
export async function* scanDuplicates(
  options: ScanOptions,
  context: ScanContext = {}
): AsyncGenerator<ScanEvent, void, undefined> {
  const rootDir = path.resolve(options.rootDir);
  await ensureValidRoot(rootDir);

  const cache = context.cache ?? new HashCache();
  const sizeGroups = await collectSizeGroups({ ...options, rootDir }, context.progress);
  const candidates = candidateFiles(sizeGroups.groups);

  const statistics: ScanStatistics = {
    totalFiles: sizeGroups.totalFiles,
    totalSubfolders: sizeGroups.totalSubfolders,
    uniqueSizeFiles: sizeGroups.uniqueSizeFiles,
    candidateFiles: candidates.length,
    duplicatesFound: 0
  };
  const duplicates: DuplicatePair[] = [];
  const index = new DuplicateIndex(new FullHashVerifier(cache, context.hashFile));
  const csv = options.csvFile ? new CsvAuditSink(options.csvFile) : undefined;
  const checkpointInterval = options.checkpointInterval ?? CACHE_CHECKPOINT_INTERVAL;
  const startedAt = Date.now();

  const event = (
    status: ScanStatus,
    message: string,
    progress: ProgressState,
    found?: DuplicatePair
  ): ScanEvent => ({
    status,
    message,
    duplicates: [...duplicates],
    found,
    progress,
    statistics: { ...statistics }
  });

  logger.info(`Starting scan in folder: ${rootDir}`);
  yield event("init", `Starting scan in folder: ${rootDir}`, computeProgress(0, candidates.length, startedAt));

  let processed = 0;
  let settled = false;
  try {
    for (const record of candidates) {
      if (isStopRequested(options.stop)) {
        const message = `Scan stopped by user after processing ${processed} files.`;
        logger.info(message);
        await cache.flush();
        settled = true;
        yield event("stopped", message, computeProgress(processed, candidates.length, startedAt));
        return;
      }

      const outcome = await index.classify(record);
      let found: DuplicatePair | undefined;
      if (outcome.kind === "duplicate") {
        found = outcome.pair;
        duplicates.push(found);
        statistics.duplicatesFound = duplicates.length;
        logger.info(`Duplicate found: ${found.duplicate} (duplicate) -> ${found.original} (original)`);
        csv?.append(found.duplicate, found.original);
      }

      processed++;
      if (checkpointInterval > 0 && processed % checkpointInterval === 0) {
        await cache.flush();
      }

      yield event("scanning", record.filePath, computeProgress(processed, candidates.length, startedAt), found);
    }

    const summary = `Total duplicates found: ${duplicates.length}`;
    logger.info(summary);
    await cache.flush();
    settled = true;
    const elapsed = computeProgress(processed, candidates.length, startedAt);
    yield event("finished", summary, { ...elapsed, percent: 100, etaMs: 0 });
  } finally {
    // consumer left the loop before stopped/finished
    if (!settled) {
      await cache.flush();
    }
  }
}

async function runToCompletion(options: FindOptions, context: ScanContext): Promise<ScanEvent> {
  let last: ScanEvent | undefined;
  for await (const event of scanDuplicates(options, context)) {
    last = event;
  }
  if (!last) {
    throw new Error(`Scan of ${options.rootDir} produced no events`);
  }
  return last;
}

/**
 * Finds every duplicate pair under one root without streaming.
 *
 * A group of N identical files yields N-1 pairs, all naming the same
 * canonical original.
 */
export async function findAllDuplicates(
  options: FindOptions,
  context: ScanContext = {}
): Promise<DuplicatePair[]> {
  const final = await runToCompletion(options, context);
  return [...final.duplicates];
}

/**
 * Buckets duplicate sizes (in MB) into equal-width bins spanning min..max.
 * A single distinct size gets a one-megabyte-wide range centred on it.
 */
export function buildSizeHistogram(sizesBytes: number[], bins = HISTOGRAM_BINS): HistogramBucket[] {
  if (sizesBytes.length === 0) {
    return [];
  }

  const sizesMb = sizesBytes.map((size) => size / BYTES_PER_MEGABYTE);
  let low = sizesMb.reduce((a, b) => Math.min(a, b));
  let high = sizesMb.reduce((a, b) => Math.max(a, b));
  if (low === high) {
    low -= 0.5;
    high += 0.5;
  }

  const width = (high - low) / bins;
  const buckets: HistogramBucket[] = Array.from({ length: bins }, (_, i) => ({
    fromMb: low + i * width,
    toMb: i === bins - 1 ? high : low + (i + 1) * width,
    count: 0
  }));

  for (const size of sizesMb) {
    const slot = Math.min(Math.floor((size - low) / width), bins - 1);
    buckets[slot].count++;
  }
  return buckets;
}

/**
 * Scans several roots and sums their statistics. Every root is validated
 * before any scanning starts.
 *
 * @throws InputValidationError when no roots are given or any root is unusable
 */
export async function buildAggregateReport(
  roots: string[],
  filters: Omit<FindOptions, "rootDir">,
  context: ScanContext = {}
): Promise<AggregateReport> {
  if (roots.length === 0) {
    throw new InputValidationError("No directories provided for advanced report.");
  }
  const resolved = roots.map((root) => path.resolve(root));
  for (const root of resolved) {
    await ensureValidRoot(root);
  }

  const cache = context.cache ?? new HashCache();
  const report: AggregateReport = {
    directories: resolved.length,
    totalFiles: 0,
    totalSubfolders: 0,
    uniqueSizeFiles: 0,
    duplicates: [],
    duplicateBytes: 0,
    sizeHistogram: []
  };

  for (const rootDir of resolved) {
    const final = await runToCompletion({ ...filters, rootDir }, { ...context, cache });
    report.totalFiles += final.statistics.totalFiles;
    report.totalSubfolders += final.statistics.totalSubfolders;
    report.uniqueSizeFiles += final.statistics.uniqueSizeFiles;
    report.duplicates.push(...final.duplicates);
  }

  const sizes: number[] = [];
  for (const pair of report.duplicates) {
    try {
      const { size } = await fsp.stat(pair.duplicate);
      sizes.push(size);
      report.duplicateBytes += size;
    } catch (err) {
      logger.error(`Error obtaining size for file: ${pair.duplicate}: ${errorMessage(err)}`);
    }
  }
  report.sizeHistogram = buildSizeHistogram(sizes);

  return report;
}
