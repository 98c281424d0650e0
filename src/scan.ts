import fs from "fs";
import path from "path";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { WalkProgress } from "./progress";
import { FileRecord, FindOptions, SizeGroups } from "./types";

const fsp = fs.promises;

export interface WalkCallbacks {
  onFile: (filePath: string) => Promise<void>;
  onDirectory?: (dirPath: string) => void;
}

/**
 * Recursively walks a directory tree and invokes a callback for each regular file
 * and, optionally, each subdirectory below the root.
 *
 * Symbolic links are never followed to prevent cycles and unexpected behavior.
 * Unreadable directories are logged but do not stop the traversal.
 *
 * @param rootDir - Absolute path to directory to walk
 *
 * @example
 * await walkDirectory('/path/to/dir', {
 *   onFile: async (filePath) => console.log(`Found: ${filePath}`)
 * });
 */
export async function walkDirectory(rootDir: string, callbacks: WalkCallbacks): Promise<void> {
  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    logger.error(`Error reading directory: ${rootDir}: ${errorMessage(err)}`);
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(rootDir, entry.name);

    // Do not follow symbolic links to avoid cycles or unexpected paths.
    if (entry.isSymbolicLink()) {
      continue;
    }

    if (entry.isDirectory()) {
      callbacks.onDirectory?.(fullPath);
      await walkDirectory(fullPath, callbacks);
      continue;
    }

    if (entry.isFile()) {
      await callbacks.onFile(fullPath);
    }
  }
}

/**
 * Case-sensitive suffix match of the file name, as typed by the user
 * (`.JPG` does not match `photo.jpg`).
 */
export function matchesExtension(filePath: string, extension?: string): boolean {
  return !extension || path.basename(filePath).endsWith(extension);
}

/**
 * Scans a directory and groups files by exact byte size.
 *
 * Only files of a shared size can be duplicates, so later stages hash nothing
 * else. File and subfolder totals cover the whole tree regardless of the
 * extension and size filters; they feed the statistics, not candidate selection.
 *
 * A file whose size cannot be read (permission error, deleted mid-walk) is
 * logged and skipped.
 *
 * @example
 * const { groups } = await collectSizeGroups({ rootDir: '/photos', extension: '.jpg' });
 * for (const [size, files] of groups) {
 *   if (files.length > 1) {
 *     console.log(`${files.length} files of size ${size} bytes`);
 *   }
 * }
 */
export async function collectSizeGroups(
  options: FindOptions,
  progress?: WalkProgress
): Promise<SizeGroups> {
  const rootDir = path.resolve(options.rootDir);
  const excluded = new Set((options.excludePaths ?? []).map((p) => path.resolve(p)));
  const minSizeBytes = options.minSizeBytes ?? 0;

  const groups = new Map<number, string[]>();
  let totalFiles = 0;
  let totalSubfolders = 0;

  progress?.startScanning();

  await walkDirectory(rootDir, {
    onDirectory: () => {
      totalSubfolders++;
    },
    onFile: async (filePath) => {
      totalFiles++;
      progress?.updateScanning(totalFiles);

      if (excluded.has(filePath) || !matchesExtension(filePath, options.extension)) {
        return;
      }

      let stats: fs.Stats;
      try {
        stats = await fsp.stat(filePath);
      } catch (err) {
        logger.error(`Error stating file: ${filePath}: ${errorMessage(err)}`);
        return;
      }

      if (!stats.isFile()) {
        return;
      }

      const size = stats.size;
      if (minSizeBytes > 0 && size < minSizeBytes) {
        return;
      }

      const group = groups.get(size);
      if (group) {
        group.push(filePath);
      } else {
        groups.set(size, [filePath]);
      }
    }
  });

  progress?.endScanning(totalFiles);

  let uniqueSizeFiles = 0;
  for (const files of groups.values()) {
    if (files.length === 1) {
      uniqueSizeFiles++;
    }
  }

  return { groups, totalFiles, totalSubfolders, uniqueSizeFiles };
}

/**
 * Flattens every size group holding two or more files into the candidate
 * list, keeping enumeration order. Each candidate carries its size.
 */
export function candidateFiles(groups: Map<number, string[]>): FileRecord[] {
  const candidates: FileRecord[] = [];
  for (const [size, files] of groups) {
    if (files.length < 2) {
      continue;
    }
    for (const filePath of files) {
      candidates.push({ filePath, size });
    }
  }
  return candidates;
}
