import crypto from "crypto";
import fs from "fs";
import { performance } from "perf_hooks";
import { CHUNK_SIZE, DIGEST_ALGORITHM } from "./config";
import { errorMessage } from "./errors";
import { FilePath, HashOutcome } from "./types";

const fsp = fs.promises;

export const CANCELLED_MESSAGE = "cancelled";

/**
 * Signature shared by the real digest routine and test doubles.
 */
export type DigestFunction = (filePath: FilePath, signal: AbortSignal) => Promise<HashOutcome>;

/**
 * Computes the MD5 fingerprint of a file, reading it in fixed 128 KiB chunks.
 *
 * The signal is checked before every chunk read. Once it is aborted the read
 * loop stops and the outcome is a failure with message "cancelled"; a partial
 * digest is never returned. I/O errors become failures as well, so the
 * returned promise never rejects. `sizeBytes` and `durationSeconds` always
 * report what was read and how long it took, measured on the monotonic clock.
 *
 * @param filePath - Absolute path to the file to hash
 * @param signal - Cancellation signal shared by every file of a job
 *
 * @example
 * const outcome = await digestFile('/path/to/file.txt', new AbortController().signal);
 * if (outcome.ok) console.log(outcome.digest); // "d41d8cd98f00b204e9800998ecf8427e" for an empty file
 */
export async function digestFile(filePath: FilePath, signal: AbortSignal): Promise<HashOutcome> {
  const start = performance.now();
  const elapsed = (): number => (performance.now() - start) / 1000;
  let sizeBytes = 0;

  try {
    const hash = crypto.createHash(DIGEST_ALGORITHM);
    const handle = await fsp.open(filePath, "r");
    try {
      const buffer = Buffer.alloc(CHUNK_SIZE);
      while (true) {
        if (signal.aborted) {
          return { ok: false, message: CANCELLED_MESSAGE, sizeBytes, durationSeconds: elapsed() };
        }

        const { bytesRead } = await handle.read(buffer, 0, CHUNK_SIZE, null);
        if (bytesRead === 0) {
          break;
        }

        sizeBytes += bytesRead;
        hash.update(buffer.subarray(0, bytesRead));
      }
    } finally {
      await handle.close();
    }

    return { ok: true, digest: hash.digest("hex"), sizeBytes, durationSeconds: elapsed() };
  } catch (err) {
    return { ok: false, message: errorMessage(err), sizeBytes, durationSeconds: elapsed() };
  }
}
