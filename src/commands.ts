import path from "path";
import { deleteDuplicates, moveDuplicates } from "./actions";
import { HashCache } from "./cache";
import { megabytesToBytes, normalizeExtension } from "./config";
import { DupsiftError, errorMessage, InputValidationError } from "./errors";
import { logger } from "./logger";
import { buildAggregateReport, findAllDuplicates, scanDuplicates, ScanContext } from "./orchestrator";
import { ProgressReporter } from "./progress";
import {
  formatAggregateReport,
  formatDeleteResult,
  formatFindings,
  formatMoveResult
} from "./report";
import {
  AggregateReport,
  DeleteResult,
  DuplicatePair,
  FindOptions,
  ScanStatistics,
  StopCondition
} from "./types";

export type ActionName = "find" | "delete" | "simulate" | "move" | "report";

export interface CommandRequest {
  action: ActionName;
  /** One root for every action except "report", which takes any number */
  roots: string[];
  /** Raw extension filter; a leading dot is added when missing */
  extension?: string;
  minSizeMb?: number;
  /** Required for "move" */
  targetDir?: string;
  /** Enables the CSV audit sink ("find" only) */
  csvFile?: string;
  /** Persistent hash cache; memory-only when omitted */
  cacheFile?: string;
  /** Extra paths never scanned, e.g. the log file */
  excludePaths?: string[];
  stop?: StopCondition;
}

export type CommandResult =
  | { status: "error"; message: string }
  | {
      status: "done";
      action: "find";
      message: string;
      stopped: boolean;
      duplicates: DuplicatePair[];
      statistics: ScanStatistics;
    }
  | {
      status: "done";
      action: "delete" | "simulate";
      message: string;
      duplicates: DuplicatePair[];
      result: DeleteResult;
    }
  | {
      status: "done";
      action: "move";
      message: string;
      duplicates: DuplicatePair[];
      moved: string[];
    }
  | { status: "done"; action: "report"; message: string; report: AggregateReport };

const NO_DUPLICATES = "No duplicate files found.";

function nonBlankRoots(request: CommandRequest): string[] {
  return request.roots.map((root) => root.trim()).filter(Boolean);
}

function singleRoot(request: CommandRequest): string {
  const roots = nonBlankRoots(request);
  if (roots.length === 0) {
    throw new InputValidationError("A folder to scan must be specified.");
  }
  if (roots.length > 1) {
    throw new InputValidationError(`The ${request.action} action scans a single folder; got ${roots.length}.`);
  }
  return roots[0];
}

/**
 * Runs one user action end to end.
 *
 * Input problems (no folder, missing folder, move without a target) come back
 * as a single `{ status: "error" }` result before any scanning. Per-file
 * problems are only logged. The hash cache is loaded once and flushed by the
 * scan itself.
 *
 * @param progress - Receives walk feedback and, for "find", every scan event
 */
export async function runCommand(
  request: CommandRequest,
  progress?: ProgressReporter
): Promise<CommandResult> {
  try {
    return await dispatch(request, progress);
  } catch (err) {
    if (err instanceof DupsiftError) {
      logger.error(err.message);
      return { status: "error", message: err.message };
    }
    const message = `Error during duplicate search: ${errorMessage(err)}`;
    logger.error(message);
    return { status: "error", message };
  }
}

async function dispatch(request: CommandRequest, progress?: ProgressReporter): Promise<CommandResult> {
  const filters: Omit<FindOptions, "rootDir"> = {
    extension: normalizeExtension(request.extension),
    minSizeBytes: megabytesToBytes(request.minSizeMb ?? 0),
    excludePaths: [request.cacheFile, request.csvFile, ...(request.excludePaths ?? [])]
      .filter((p): p is string => Boolean(p))
      .map((p) => path.resolve(p))
  };

  if (request.action === "move" && !request.targetDir?.trim()) {
    throw new InputValidationError("Target folder must be specified for moving duplicates.");
  }

  const cache = new HashCache(request.cacheFile);
  await cache.load();
  const context: ScanContext = { cache, progress };

  if (request.action === "report") {
    const report = await buildAggregateReport(nonBlankRoots(request), filters, context);
    return { status: "done", action: "report", message: formatAggregateReport(report), report };
  }

  const rootDir = singleRoot(request);

  if (request.action === "find") {
    let stopped = false;
    let duplicates: readonly DuplicatePair[] = [];
    let statistics: ScanStatistics | undefined;
    let message = "";
    const scan = scanDuplicates(
      { ...filters, rootDir, stop: request.stop, csvFile: request.csvFile },
      context
    );
    for await (const event of scan) {
      progress?.scanEvent(event);
      duplicates = event.duplicates;
      statistics = event.statistics;
      stopped = event.status === "stopped";
      message = event.message;
    }
    if (!statistics) {
      throw new Error("scan ended without reporting statistics");
    }
    return {
      status: "done",
      action: "find",
      message: formatFindings(duplicates) + message,
      stopped,
      duplicates: [...duplicates],
      statistics
    };
  }

  const duplicates = await findAllDuplicates({ ...filters, rootDir }, context);

  if (request.action === "move") {
    const targetDir = request.targetDir ?? "";
    if (duplicates.length === 0) {
      return { status: "done", action: "move", message: NO_DUPLICATES, duplicates, moved: [] };
    }
    const result = await moveDuplicates(duplicates, targetDir);
    if (!result.ok) {
      return { status: "error", message: result.error };
    }
    return {
      status: "done",
      action: "move",
      message: formatMoveResult(result, targetDir),
      duplicates,
      moved: result.paths
    };
  }

  const simulate = request.action === "simulate";
  const result =
    duplicates.length === 0
      ? { count: 0, bytesFreed: 0, paths: [], simulated: simulate }
      : await deleteDuplicates(duplicates, simulate);
  return {
    status: "done",
    action: request.action,
    message: duplicates.length === 0 ? NO_DUPLICATES : formatDeleteResult(result),
    duplicates,
    result
  };
}
