import fs from "fs";
import { errorMessage } from "./errors";
import { formatTimestamp, logger } from "./logger";

const HEADER = ["timestamp", "duplicate_file", "original_file"];

/** Quotes a field when it contains a comma, quote or line break (RFC 4180). */
export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsvRow(fields: string[]): string {
  return fields.map(escapeCsvField).join(",") + "\n";
}

/**
 * Append-only audit trail of (timestamp, duplicate, original) rows.
 *
 * The header row is written only when the file does not exist yet, so several
 * runs can share one file. Appends are synchronous to keep rows in discovery
 * order; a failed write is logged and the scan carries on.
 */
export class CsvAuditSink {
  constructor(readonly filePath: string) {}

  append(duplicate: string, original: string, at: Date = new Date()): void {
    try {
      const rows: string[] = [];
      if (!fs.existsSync(this.filePath)) {
        rows.push(formatCsvRow(HEADER));
      }
      rows.push(formatCsvRow([formatTimestamp(at), duplicate, original]));
      fs.appendFileSync(this.filePath, rows.join(""), "utf8");
    } catch (err) {
      logger.error(`Error writing to CSV file: ${this.filePath}: ${errorMessage(err)}`);
    }
  }
}
