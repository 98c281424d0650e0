#!/usr/bin/env node
import { Command, Option } from "commander";
import path from "path";
import { ActionName, CommandRequest, runCommand } from "./commands";
import { CSV_FILE_NAME, defaultCachePath } from "./config";
import { errorMessage } from "./errors";
import { logger, LoggerOptions, LogLevel } from "./logger";
import { createProgressReporter } from "./progress";
import { formatFindings, formatStatistics } from "./report";

export interface CliOptions {
  ext?: string;
  minSize: string;
  target?: string;
  csv?: string | boolean;
  cache?: string | false;
  logFile?: string;
  logLevel: LogLevel;
  quiet?: boolean;
}

function withScanOptions(command: Command): Command {
  return command
    .option("-e, --ext <extension>", "only consider file names ending with this extension (case-sensitive)")
    .option("-m, --min-size <megabytes>", "ignore files smaller than this many MB", "0")
    .option("--cache <file>", `hash cache file (default ${defaultCachePath()})`)
    .option("--no-cache", "do not read or write a hash cache")
    .option("--log-file <file>", "also write log lines to this file")
    .addOption(
      new Option("--log-level <level>", "minimum level written to the log")
        .choices(["debug", "info", "warn", "error", "silent"])
        .default("warn")
    )
    .option("-q, --quiet", "no progress output");
}

function toRequest(action: ActionName, roots: string[], options: CliOptions, stop?: AbortSignal): CommandRequest {
  const minSizeMb = Number(options.minSize);
  if (Number.isNaN(minSizeMb)) {
    throw new Error(`Invalid --min-size: ${options.minSize}`);
  }

  let csvFile: string | undefined;
  if (options.csv === true) {
    csvFile = path.resolve(CSV_FILE_NAME);
  } else if (typeof options.csv === "string") {
    csvFile = path.resolve(options.csv);
  }

  return {
    action,
    roots,
    extension: options.ext,
    minSizeMb,
    targetDir: options.target,
    csvFile,
    cacheFile: options.cache === false ? undefined : path.resolve(options.cache ?? defaultCachePath()),
    excludePaths: options.logFile ? [path.resolve(options.logFile)] : [],
    stop
  };
}

/**
 * With a log file configured, log lines stay off stderr while the progress
 * line is drawn there.
 */
export function loggerOptions(options: CliOptions): LoggerOptions {
  return {
    level: options.logLevel,
    logFile: options.logFile,
    console: Boolean(options.quiet) || !options.logFile
  };
}

async function execute(action: ActionName, roots: string[], options: CliOptions): Promise<void> {
  logger.configure(loggerOptions(options));

  // First Ctrl+C stops the scan after the current file; a second one exits.
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    process.stderr.write("\nStop requested.\n");
    controller.abort();
  };
  process.on("SIGINT", onSigint);

  try {
    const request = toRequest(action, roots, options, controller.signal);
    const result = await runCommand(request, createProgressReporter(!options.quiet));

    if (result.status === "error") {
      console.error(result.message);
      process.exitCode = 1;
      return;
    }

    if (result.action === "find") {
      process.stdout.write(formatFindings(result.duplicates));
      console.log(formatStatistics(result.statistics));
      if (result.stopped) {
        process.exitCode = 130;
      }
      return;
    }

    console.log(result.message);
  } finally {
    process.off("SIGINT", onSigint);
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("dupsift")
    .description("Find byte-identical duplicate files and report, delete or move the redundant copies")
    .version("0.1.0");

  withScanOptions(
    program
      .command("find <root>")
      .description("stream a duplicate scan with live progress")
      .option("--csv [file]", `append each duplicate to a CSV audit file (default ${CSV_FILE_NAME})`)
  ).action((root: string, options: CliOptions) => execute("find", [root], options));

  withScanOptions(program.command("delete <root>").description("delete every duplicate, keeping originals")).action(
    (root: string, options: CliOptions) => execute("delete", [root], options)
  );

  withScanOptions(
    program.command("simulate <root>").description("report what delete would free without removing anything")
  ).action((root: string, options: CliOptions) => execute("simulate", [root], options));

  withScanOptions(
    program
      .command("move <root>")
      .description("move every duplicate into a target folder")
      .requiredOption("-t, --target <dir>", "folder receiving the duplicates")
  ).action((root: string, options: CliOptions) => execute("move", [root], options));

  withScanOptions(
    program.command("report <roots...>").description("aggregate duplicate statistics across several folders")
  ).action((roots: string[], options: CliOptions) => execute("report", roots, options));

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (require.main === module) {
  runCli().catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
}
