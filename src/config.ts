import os from "os";

export const CHUNK_SIZE = 128 * 1024;
export const DIGEST_ALGORITHM = "md5";
export const MIN_CONCURRENCY = 2;
export const MAX_CONCURRENCY = 32;
export const PROGRESS_INTERVAL_MS = 100;

/**
 * Worker count used when the caller does not pick one: twice the CPU count,
 * kept within [MIN_CONCURRENCY, MAX_CONCURRENCY].
 */
export function defaultConcurrency(cpuCount = os.cpus().length || 4): number {
  return Math.max(MIN_CONCURRENCY, Math.min(MAX_CONCURRENCY, cpuCount * 2));
}
