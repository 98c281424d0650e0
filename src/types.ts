/**
 * A file under consideration during one scan pass.
 */
export interface FileRecord {
  filePath: string;
  size: number;
  quickHash?: string;
  fullHash?: string;
  mtimeMs?: number;
}

/**
 * Result of grouping a directory tree by file size.
 */
export interface SizeGroups {
  /** File size in bytes → paths sharing that size, in enumeration order */
  groups: Map<number, string[]>;
  /** Every regular file in the tree, ignoring filters */
  totalFiles: number;
  /** Every subfolder in the tree, ignoring filters */
  totalSubfolders: number;
  /** Filtered files whose size no other file shares */
  uniqueSizeFiles: number;
}

/**
 * A confirmed duplicate and the file kept as its canonical original.
 */
export interface DuplicatePair {
  duplicate: string;
  original: string;
}

export interface ScanStatistics {
  totalFiles: number;
  totalSubfolders: number;
  uniqueSizeFiles: number;
  /** Files whose size is shared by at least one other file */
  candidateFiles: number;
  /** Running count of duplicate pairs */
  duplicatesFound: number;
}

export interface ProgressState {
  processed: number;
  total: number;
  /** Whole percent in [0, 100] */
  percent: number;
  elapsedMs: number;
  /** Remaining time extrapolated from the average per-file time; null before the first file */
  etaMs: number | null;
}

export type ScanStatus = "init" | "scanning" | "stopped" | "finished";

export interface ScanEvent {
  status: ScanStatus;
  /** Status line; for "scanning" events, the path of the file just processed */
  message: string;
  /** Snapshot of the duplicate pairs found up to this event, in discovery order */
  duplicates: readonly DuplicatePair[];
  /** Pair confirmed while processing this event's file, if any */
  found?: DuplicatePair;
  progress: ProgressState;
  statistics: ScanStatistics;
}

/**
 * Cooperative stop request, polled once per candidate file.
 */
export type StopCondition = AbortSignal | (() => boolean);

export interface FindOptions {
  /** Absolute or relative path of the tree to scan */
  rootDir: string;
  /** Case-sensitive file name suffix, already normalized with a leading dot */
  extension?: string;
  minSizeBytes?: number;
  /** Paths never considered, e.g. the cache or CSV file living inside the tree */
  excludePaths?: string[];
}

export interface ScanOptions extends FindOptions {
  stop?: StopCondition;
  /** Flush the cache after this many processed candidates */
  checkpointInterval?: number;
  /** When set, every pair found is appended to this CSV file */
  csvFile?: string;
}

export interface DeleteResult {
  count: number;
  bytesFreed: number;
  paths: string[];
  simulated: boolean;
}

export type MoveResult =
  | { ok: true; count: number; paths: string[] }
  | { ok: false; error: string };

export interface HistogramBucket {
  fromMb: number;
  toMb: number;
  count: number;
}

/**
 * Totals across several scanned roots.
 */
export interface AggregateReport {
  directories: number;
  totalFiles: number;
  totalSubfolders: number;
  uniqueSizeFiles: number;
  duplicates: DuplicatePair[];
  /** Sum of the sizes of every duplicate (not original) file */
  duplicateBytes: number;
  sizeHistogram: HistogramBucket[];
}
