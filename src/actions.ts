import fs from "fs";
import path from "path";
import { errorCode, errorMessage } from "./errors";
import { logger } from "./logger";
import { DeleteResult, DuplicatePair, MoveResult } from "./types";

const fsp = fs.promises;

/**
 * Removes the duplicate side of every pair, or with `simulate` only adds up
 * what removal would free. Originals are never touched.
 *
 * A file that cannot be sized or removed is logged and left out of the result;
 * the batch always runs to the end.
 */
export async function deleteDuplicates(
  pairs: readonly DuplicatePair[],
  simulate = false
): Promise<DeleteResult> {
  const result: DeleteResult = { count: 0, bytesFreed: 0, paths: [], simulated: simulate };

  for (const { duplicate } of pairs) {
    try {
      const { size } = await fsp.stat(duplicate);
      if (simulate) {
        logger.info(`Simulated deletion for file: ${duplicate}`);
      } else {
        await fsp.unlink(duplicate);
        logger.info(`Deleted file: ${duplicate}`);
      }
      result.bytesFreed += size;
      result.count++;
      result.paths.push(duplicate);
    } catch (err) {
      logger.error(`Error deleting file: ${duplicate}: ${errorMessage(err)}`);
    }
  }

  return result;
}

// Cannot hard-link: another filesystem, or one without link support.
const LINK_UNSUPPORTED = new Set(["EXDEV", "EPERM", "ENOTSUP", "EOPNOTSUPP"]);

/**
 * Moves `source` to `destination`, failing with EEXIST when the destination
 * is taken at the moment of the move. The new name is claimed by a hard link
 * (or an exclusive copy where links are unavailable) before the source is
 * removed.
 */
export async function moveWithoutClobber(source: string, destination: string): Promise<void> {
  try {
    await fsp.link(source, destination);
  } catch (err) {
    const code = errorCode(err);
    if (code === undefined || !LINK_UNSUPPORTED.has(code)) {
      throw err;
    }
    await fsp.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
  }
  await fsp.unlink(source);
}

/**
 * Moves each duplicate into `targetDir` under its own file name.
 *
 * The target is created when missing; if that fails nothing is moved and the
 * error is returned. A per-file failure, including a name already taken in the
 * target, is logged and skipped.
 */
export async function moveDuplicates(
  pairs: readonly DuplicatePair[],
  targetDir: string
): Promise<MoveResult> {
  const target = path.resolve(targetDir);
  try {
    const created = await fsp.mkdir(target, { recursive: true });
    if (created) {
      logger.info(`Created target folder: ${target}`);
    }
  } catch (err) {
    const error = `Error creating target folder '${target}': ${errorMessage(err)}`;
    logger.error(error);
    return { ok: false, error };
  }

  const moved: string[] = [];
  for (const { duplicate } of pairs) {
    const destination = path.join(target, path.basename(duplicate));
    try {
      await moveWithoutClobber(duplicate, destination);
      moved.push(destination);
      logger.info(`Moved file '${duplicate}' to '${destination}'`);
    } catch (err) {
      logger.error(`Error moving file: ${duplicate}: ${errorMessage(err)}`);
    }
  }

  return { ok: true, count: moved.length, paths: moved };
}
