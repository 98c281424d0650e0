import path from "path";
import { ProgressState, ScanEvent } from "./types";

/**
 * Computes processed/total, whole percent, elapsed time and an ETA
 * extrapolated from the average time per processed file.
 */
export function computeProgress(
  processed: number,
  total: number,
  startedAt: number,
  now: number = Date.now()
): ProgressState {
  const elapsedMs = Math.max(0, now - startedAt);
  const percent = total > 0 ? Math.floor((processed / total) * 100) : 100;
  const etaMs = processed > 0 ? (elapsedMs / processed) * (total - processed) : null;
  return { processed, total, percent, elapsedMs, etaMs };
}

/** Formats a millisecond duration as HH:MM:SS (hours are not wrapped at 24). */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((n) => String(n).padStart(2, "0")).join(":");
}

export function describeProgress(progress: ProgressState): string {
  const eta = progress.etaMs === null ? "Calculating..." : formatDuration(progress.etaMs);
  return (
    `Processed ${progress.processed} / ${progress.total} files (${progress.percent}%). ` +
    `Elapsed Time: ${formatDuration(progress.elapsedMs)}, ETA: ${eta}`
  );
}

/**
 * Feedback during the directory walk, before any candidate is hashed.
 */
export interface WalkProgress {
  /** Called when directory scanning begins */
  startScanning(): void;

  /** Called for every file found */
  updateScanning(filesFound: number): void;

  /** Called when directory scanning completes */
  endScanning(totalFiles: number): void;
}

/**
 * Interface for rendering a streaming scan to the user.
 */
export interface ProgressReporter extends WalkProgress {
  /** Called for every event the scan emits */
  scanEvent(event: ScanEvent): void;
}

/**
 * Progress reporter that outputs to stderr with throttled updates.
 * Terminal events (stopped, finished) are always drawn.
 */
class StderrProgressReporter implements ProgressReporter {
  private lastUpdate = 0;
  private readonly UPDATE_INTERVAL_MS = 100;
  private reportedDuplicates = 0;

  startScanning(): void {
    process.stderr.write("Scanning directory...\n");
  }

  updateScanning(filesFound: number): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
    this.lastUpdate = now;

    process.stderr.write(`\rFiles found: ${filesFound}`);
  }

  endScanning(totalFiles: number): void {
    process.stderr.write(`\rFiles found: ${totalFiles}\n`);
  }

  scanEvent(event: ScanEvent): void {
    // New findings are printed as permanent lines above the progress line.
    for (const pair of event.duplicates.slice(this.reportedDuplicates)) {
      process.stderr.write(`\r\x1b[2KDuplicate: ${pair.duplicate}\n  Original: ${pair.original}\n`);
    }
    this.reportedDuplicates = event.duplicates.length;

    if (event.status === "init") {
      process.stderr.write(`${event.message}\n`);
      return;
    }

    if (event.status === "scanning") {
      const now = Date.now();
      if (now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
      this.lastUpdate = now;

      const fileName = event.message ? path.basename(event.message) : "";
      const display = `\r\x1b[2K${describeProgress(event.progress)} ${fileName}`;
      process.stderr.write(display);
      return;
    }

    process.stderr.write(`\r\x1b[2K${describeProgress(event.progress)}\n${event.message}\n`);
  }
}

/**
 * No-op progress reporter that produces no output.
 * Used when progress reporting is disabled (e.g., --quiet).
 */
class NoOpProgressReporter implements ProgressReporter {
  startScanning(): void {}
  updateScanning(_filesFound: number): void {}
  endScanning(_totalFiles: number): void {}
  scanEvent(_event: ScanEvent): void {}
}

/**
 * Creates a progress reporter based on whether progress should be enabled.
 */
export function createProgressReporter(enabled: boolean): ProgressReporter {
  return enabled ? new StderrProgressReporter() : new NoOpProgressReporter();
}
