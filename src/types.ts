/**
 * Absolute, normalized path of a regular file. Used as the identity key for
 * queue entries, results and group membership.
 */
export type FilePath = string;

/**
 * Lowercase hex content fingerprint.
 */
export type DigestKey = string;

export interface HashSuccess {
  ok: true;
  digest: DigestKey;
  sizeBytes: number;
  durationSeconds: number;
}

export interface HashFailure {
  ok: false;
  message: string;
  /** Bytes read before the failure (best effort) */
  sizeBytes: number;
  durationSeconds: number;
}

export type HashOutcome = HashSuccess | HashFailure;

/**
 * Result of digesting a single file. Emitted once per started file, in
 * completion order.
 */
export interface HashResult {
  path: FilePath;
  outcome: HashOutcome;
}

/**
 * An input that could not be expanded into files.
 */
export interface CollectWarning {
  input: string;
  message: string;
}

export interface CollectResult {
  /** Files in first-seen order, without duplicates */
  paths: FilePath[];
  warnings: CollectWarning[];
}

export type JobState = "idle" | "running" | "cancelling";

export type PathStatus = "pending" | "done" | "error";

/**
 * Delivered with the terminal completion event of a hashing job.
 */
export interface JobSummary {
  total: number;
  /** Results emitted; less than total only when the job was cancelled */
  completed: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
}

/**
 * Read-only view of one digest group.
 */
export interface GroupEntry {
  digest: DigestKey;
  groupId: number;
  paths: ReadonlySet<FilePath>;
  /** "Group N" when more than one path shares the digest */
  label: string | undefined;
}

export type GroupsSnapshot = ReadonlyMap<DigestKey, GroupEntry>;

/**
 * Statistics collected for a duplicate report.
 */
export interface ScanStats {
  /** Files produced by path collection */
  filesCollected: number;
  /** Files that produced a digest */
  filesHashed: number;
  /** Files that failed to hash, cancellations included */
  hashErrors: number;
  /** Number of duplicate groups found */
  duplicateGroups: number;
  /** Total number of duplicate files (sum across all groups) */
  duplicateFiles: number;
  /** Total bytes wasted by duplicates (sum of size × (count - 1) for each group) */
  wastedBytes: number;
}

/**
 * Complete result of building a duplicates report.
 */
export interface ReportResult {
  /** Formatted report text (empty string if no duplicates found) */
  report: string;
  /** Files that failed to hash with their messages */
  errors: Array<{ path: FilePath; message: string }>;
  warnings: CollectWarning[];
  stats: ScanStats;
  cancelled: boolean;
}
