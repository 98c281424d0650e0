import { AggregateReport, DeleteResult, DuplicatePair, MoveResult, ScanStatistics } from "./types";

const BYTES_PER_MEGABYTE = 1024 * 1024;

export function formatMegabytes(bytes: number): string {
  return `${(bytes / BYTES_PER_MEGABYTE).toFixed(2)} MB`;
}

/**
 * Renders duplicate findings, one block per pair, in discovery order.
 * Returns an empty string when there are none.
 *
 * @example
 * formatFindings([{ duplicate: '/b/x.txt', original: '/a/x.txt' }]);
 * // "Duplicate: /b/x.txt\nOriginal:  /a/x.txt\n\n"
 */
export function formatFindings(pairs: readonly DuplicatePair[]): string {
  let report = "";
  for (const pair of pairs) {
    report += `Duplicate: ${pair.duplicate}\n`;
    report += `Original:  ${pair.original}\n`;
    report += "\n";
  }
  return report;
}

export function formatStatistics(stats: ScanStatistics): string {
  return [
    `Total Files in Folder: ${stats.totalFiles}`,
    `Total Subfolders: ${stats.totalSubfolders}`,
    `Files with Unique Size: ${stats.uniqueSizeFiles}`,
    `Candidate Files: ${stats.candidateFiles}`,
    `Duplicates Found: ${stats.duplicatesFound}`
  ].join("\n");
}

export function formatDeleteResult(result: DeleteResult): string {
  if (result.simulated) {
    return (
      `Simulated Deletion: ${result.count} files.\n` +
      `Total space that would be freed: ${formatMegabytes(result.bytesFreed)}.`
    );
  }
  return `Deleted Files: ${result.count} files.\nTotal space freed: ${formatMegabytes(result.bytesFreed)}.`;
}

export function formatMoveResult(result: MoveResult, targetDir: string): string {
  if (!result.ok) {
    return result.error;
  }
  return `Moved Files: ${result.count} files have been moved to '${targetDir}'.`;
}

export function formatAggregateReport(report: AggregateReport): string {
  const lines = [
    "Advanced Report",
    `Total Directories Scanned: ${report.directories}`,
    `Total Files Scanned: ${report.totalFiles}`,
    `Total Subfolders: ${report.totalSubfolders}`,
    `Files with Unique Size: ${report.uniqueSizeFiles}`,
    `Duplicates Found: ${report.duplicates.length}`,
    `Total Space Occupied by Duplicates: ${formatMegabytes(report.duplicateBytes)}`,
    `Potential Space Savings: ${formatMegabytes(report.duplicateBytes)}`
  ];

  if (report.sizeHistogram.length > 0) {
    lines.push("", "Duplicate File Size Distribution (MB)");
    for (const bucket of report.sizeHistogram) {
      lines.push(`${bucket.fromMb.toFixed(2)} - ${bucket.toMb.toFixed(2)}: ${bucket.count}`);
    }
  }

  return lines.join("\n");
}
