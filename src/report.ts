import { performance } from "perf_hooks";
import { defaultConcurrency } from "./config";
import { HashEngineOptions, HashJob } from "./engine";
import { formatSize } from "./format";
import { ProgressReporter } from "./progress";
import { DuplicateSession } from "./session";
import { FilePath, GroupEntry, ReportResult, ScanStats } from "./types";

export interface ReportOptions extends HashEngineOptions {
  /** Worker count, defaults to {@link defaultConcurrency} */
  concurrency?: number;
  progress?: ProgressReporter;
  /** Receives the job as soon as it is submitted, e.g. to wire up cancellation */
  onJob?: (job: HashJob) => void;
}

/**
 * Renders duplicate groups as text, one block per group in group id order.
 * Paths inside a block are sorted so the output does not depend on which
 * worker finished first.
 *
 * @example
 * formatReport(session.groups.duplicateGroups(), (p) => session.resultOf(p)?.outcome.sizeBytes);
 * // Group 1 (2 files, 13 B each)
 * // Hash: 65a8e27d8879283831b664bd8b7f0ad4
 * // - /data/a.txt
 * // - /data/b.txt
 */
export function formatReport(
  groups: readonly GroupEntry[],
  sizeOf: (filePath: FilePath) => number | undefined
): string {
  let report = "";
  for (const group of groups) {
    const files = [...group.paths].sort();
    report += `${group.label ?? `Group ${group.groupId}`} (${files.length} files, ${formatSize(sizeOf(files[0]))} each)\n`;
    report += `Hash: ${group.digest}\n`;
    for (const filePath of files) {
      report += `- ${filePath}\n`;
    }
    report += "\n";
  }
  return report;
}

export function formatStats(stats: ScanStats): string {
  return [
    `Files collected: ${stats.filesCollected}`,
    `Files hashed: ${stats.filesHashed}`,
    `Hash errors: ${stats.hashErrors}`,
    `Duplicate groups: ${stats.duplicateGroups}`,
    `Duplicate files: ${stats.duplicateFiles}`,
    `Wasted space: ${formatSize(stats.wastedBytes)}`
  ].join("\n");
}

/**
 * Collects, hashes and groups files, then builds a duplicate report.
 *
 * Process:
 * 1. Expand inputs into a deduplicated list of files
 * 2. Hash every file with a bounded worker pool
 * 3. Group files by digest
 * 4. Format the groups and collect statistics
 *
 * Files that fail to hash are listed in `errors`. A cancelled run still
 * reports the groups found among the files hashed before cancellation.
 *
 * @param inputs - Files and directories to scan
 * @param options - Concurrency, progress reporter, logger and job hook
 * @returns Promise resolving to ReportResult containing:
 *   - report: Formatted text report (empty string if no duplicates found)
 *   - errors: Files that failed to hash with their messages
 *   - warnings: Inputs that could not be collected
 *   - stats: Files collected, hashed, failed, duplicate groups/files, wasted bytes
 *
 * @example
 * const result = await buildDuplicatesReport(['/path/to/scan']);
 * console.log(result.report);
 * console.log(`Found ${result.stats.duplicateGroups} duplicate groups`);
 */
export async function buildDuplicatesReport(
  inputs: readonly string[],
  options: ReportOptions = {}
): Promise<ReportResult> {
  const { concurrency = defaultConcurrency(), progress, onJob, ...engineOptions } = options;
  const session = new DuplicateSession(engineOptions);

  progress?.startScanning();
  const { paths, warnings } = await session.addPaths(inputs);
  progress?.endScanning(paths.length);

  const stats: ScanStats = {
    filesCollected: paths.length,
    filesHashed: 0,
    hashErrors: 0,
    duplicateGroups: 0,
    duplicateFiles: 0,
    wastedBytes: 0
  };
  const errors: ReportResult["errors"] = [];

  if (paths.length === 0) {
    return { report: "", errors, warnings, stats, cancelled: false };
  }

  const started = performance.now();
  const job = session.start(concurrency);
  progress?.startHashing(job.total, Math.min(concurrency, job.total));
  onJob?.(job);

  let lastPath: FilePath | undefined;
  job.onResult((result) => {
    lastPath = result.path;
    if (result.outcome.ok) {
      stats.filesHashed++;
    } else {
      errors.push({ path: result.path, message: result.outcome.message });
    }
  });
  job.onProgress((completed, total) => progress?.updateHashing(completed, total, lastPath));

  const summary = await job.done;
  progress?.endHashing(summary, (performance.now() - started) / 1000);

  stats.hashErrors = errors.length;

  const sizeOf = (filePath: FilePath): number | undefined => session.resultOf(filePath)?.outcome.sizeBytes;
  const groups = session.groups.duplicateGroups();
  for (const group of groups) {
    // Members share a digest, so any one of them gives the size.
    const [first] = group.paths;
    const size = sizeOf(first) ?? 0;
    stats.duplicateGroups++;
    stats.duplicateFiles += group.paths.size;
    stats.wastedBytes += size * (group.paths.size - 1);
  }

  return {
    report: formatReport(groups, sizeOf),
    errors,
    warnings,
    stats,
    cancelled: summary.cancelled
  };
}
