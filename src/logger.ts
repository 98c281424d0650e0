import fs from "fs";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Lines are also appended here; the file is truncated when configured */
  logFile?: string;
  /** Set false to keep stderr clean, e.g. while a progress line is drawn */
  console?: boolean;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Leveled log sink. Lines look like `2024-05-01 10:00:00 - ERROR - message`.
 *
 * Writes to stderr via console.error and, when a log file is configured,
 * appends the same line there synchronously so ordering survives a crash.
 */
export class Logger {
  private level: LogLevel = "info";
  private logFile?: string;
  private toConsole = true;

  configure(options: LoggerOptions): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.console !== undefined) {
      this.toConsole = options.console;
    }
    if (options.logFile !== undefined) {
      this.logFile = options.logFile;
      try {
        fs.writeFileSync(this.logFile, "", "utf8");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Cannot open log file: ${this.logFile}: ${message}`);
        this.logFile = undefined;
      }
    }
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = `${formatTimestamp(new Date())} - ${level.toUpperCase()} - ${message}`;
    if (this.toConsole) {
      console.error(line);
    }
    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, line + "\n", "utf8");
      } catch {
        if (this.toConsole) {
          console.error(`Log file became unwritable, detaching: ${this.logFile}`);
        }
        this.logFile = undefined;
      }
    }
  }
}

export const logger = new Logger();
