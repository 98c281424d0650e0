import fs from "fs";
import xxhash from "xxhash-wasm";
import { FULL_HASH_CHUNK_SIZE, QUICK_HASH_WINDOW } from "./config";

const fsp = fs.promises;

type XXHashApi = Awaited<ReturnType<typeof xxhash>>;

let hasherApi: Promise<XXHashApi> | undefined;

// The WebAssembly module is instantiated once per process and shared.
function loadHasher(): Promise<XXHashApi> {
  hasherApi ??= xxhash();
  return hasherApi;
}

export function toHex(digest: bigint): string {
  return digest.toString(16).padStart(16, "0");
}

/**
 * xxh64 over a bounded prefix of the file.
 *
 * Files shorter than the window are hashed whole. Equal quick hashes only make
 * two same-size files candidates; different quick hashes rule them out.
 *
 * @param window - Number of leading bytes to sample
 * @returns 16 lower-case hex digits
 * @throws Error if the file cannot be opened or read
 */
export async function quickHash(filePath: string, window = QUICK_HASH_WINDOW): Promise<string> {
  const api = await loadHasher();
  const handle = await fsp.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(window);
    let filled = 0;
    while (filled < window) {
      const { bytesRead } = await handle.read(buffer, filled, window - filled, filled);
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
    }
    return toHex(api.create64().update(buffer.subarray(0, filled)).digest());
  } finally {
    await handle.close();
  }
}

/**
 * Streams the whole file through xxh64 in fixed-size chunks, so files of any
 * size hash in constant memory.
 *
 * xxh64 is a fast non-cryptographic hash; swap in a cryptographic digest where
 * archival-grade collision guarantees are needed.
 *
 * @returns 16 lower-case hex digits
 * @throws Error if the file cannot be read or does not exist
 *
 * @example
 * const hash = await fullHash('/path/to/file.txt');
 * console.log(hash.length); // 16
 */
export async function fullHash(filePath: string): Promise<string> {
  const api = await loadHasher();
  const hasher = api.create64();

  return new Promise((resolve, reject) => {
    const stream = fs.createReadStream(filePath, { highWaterMark: FULL_HASH_CHUNK_SIZE });

    stream.on("error", reject);
    stream.on("data", (chunk) => {
      hasher.update(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });
    stream.on("end", () => resolve(toHex(hasher.digest())));
  });
}
