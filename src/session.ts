import { HashEngine, HashEngineOptions, HashJob } from "./engine";
import { JobStateError } from "./errors";
import { GroupIndex } from "./groups";
import { createLogger, Logger } from "./logger";
import { collectPaths } from "./scan";
import { CollectResult, FilePath, HashResult, JobState, PathStatus } from "./types";

/**
 * Path queue, hashing engine and group index behind one state machine.
 *
 * While a job is running or cancelling the queue and the index are frozen:
 * adding, clearing and removing paths throw {@link JobStateError}. Every
 * successful result of a job is recorded into {@link DuplicateSession.groups}
 * before the host's own result listeners run; starting a job regroups from
 * scratch.
 */
export class DuplicateSession {
  readonly groups = new GroupIndex();

  private readonly engine: HashEngine;
  private readonly logger: Logger;
  private readonly queue = new Set<FilePath>();
  private readonly statuses = new Map<FilePath, PathStatus>();
  private readonly results = new Map<FilePath, HashResult>();

  constructor(options: HashEngineOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.engine = new HashEngine({ ...options, logger: this.logger });
  }

  get state(): JobState {
    return this.engine.state;
  }

  /** Queued paths in insertion order */
  get paths(): FilePath[] {
    return [...this.queue];
  }

  /**
   * Collects files from `inputs` and appends those not queued yet.
   * Returns only the newly added paths.
   *
   * @throws JobStateError QUEUE_LOCKED, synchronously, while a job is active
   */
  addPaths(inputs: readonly string[]): Promise<CollectResult> {
    this.assertIdle();
    return this.collectInto(inputs);
  }

  private async collectInto(inputs: readonly string[]): Promise<CollectResult> {
    const collected = await collectPaths(inputs, this.logger, this.queue);
    // Collection awaits the filesystem; a job may have started meanwhile.
    this.assertIdle();
    for (const filePath of collected.paths) {
      this.queue.add(filePath);
      this.statuses.set(filePath, "pending");
    }
    return collected;
  }

  clear(): void {
    this.assertIdle();
    this.queue.clear();
    this.statuses.clear();
    this.results.clear();
    this.groups.clear();
  }

  /** Drops paths from the queue and the group index, e.g. after the host trashed them. */
  removePaths(filePaths: Iterable<FilePath>): void {
    this.assertIdle();
    const removed = [...filePaths];
    for (const filePath of removed) {
      this.queue.delete(filePath);
      this.statuses.delete(filePath);
      this.results.delete(filePath);
    }
    this.groups.remove(removed);
  }

  /**
   * Hashes every queued path.
   *
   * @throws JobStateError JOB_ACTIVE while a job is active, EMPTY_QUEUE when nothing is queued
   */
  start(concurrency?: number): HashJob {
    if (this.engine.state !== "idle") {
      throw new JobStateError("JOB_ACTIVE");
    }
    if (this.queue.size === 0) {
      throw new JobStateError("EMPTY_QUEUE");
    }

    const job = this.engine.submit([...this.queue], concurrency);
    for (const filePath of this.queue) {
      this.statuses.set(filePath, "pending");
    }
    this.results.clear();
    this.groups.clear();

    job.onResult((result) => {
      this.results.set(result.path, result);
      if (result.outcome.ok) {
        this.statuses.set(result.path, "done");
        this.groups.record(result.path, result.outcome.digest);
      } else {
        this.statuses.set(result.path, "error");
      }
    });
    return job;
  }

  cancel(): void {
    this.engine.cancel();
  }

  statusOf(filePath: FilePath): PathStatus | undefined {
    return this.statuses.get(filePath);
  }

  resultOf(filePath: FilePath): HashResult | undefined {
    return this.results.get(filePath);
  }

  /** Queued paths whose latest job produced a digest */
  completedPaths(): FilePath[] {
    return this.paths.filter((filePath) => this.statuses.get(filePath) === "done");
  }

  private assertIdle(): void {
    if (this.engine.state !== "idle") {
      throw new JobStateError("QUEUE_LOCKED");
    }
  }
}
