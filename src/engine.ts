import { EventEmitter } from "events";
import { performance } from "perf_hooks";
import { defaultConcurrency } from "./config";
import { JobStateError, errorMessage } from "./errors";
import { DigestFunction, digestFile } from "./hash";
import { createLogger, Logger } from "./logger";
import { FilePath, HashResult, JobState, JobSummary } from "./types";

export type ProgressListener = (completed: number, total: number) => void;
export type ResultListener = (result: HashResult) => void;
export type FinishedListener = (summary: JobSummary) => void;

export interface HashEngineOptions {
  /** Replaces the file digest routine, mainly for tests */
  digest?: DigestFunction;
  logger?: Logger;
}

/**
 * Handle for one hashing run.
 *
 * Events, in order: `progress(0, total)`, then a `result` followed by
 * `progress(k, total)` for each completed file, then `finished` exactly once.
 * Work starts on the next turn of the event loop, so listeners attached right
 * after {@link HashEngine.submit} returns see every event.
 */
export class HashJob {
  readonly paths: readonly FilePath[];
  readonly total: number;
  readonly concurrency: number;
  /** Resolves with the summary after the `finished` event has been emitted */
  readonly done: Promise<JobSummary>;

  private readonly events = new EventEmitter();
  private readonly controller = new AbortController();
  private readonly resolveDone: (summary: JobSummary) => void;
  private finished = false;

  constructor(
    paths: readonly FilePath[],
    concurrency: number,
    private readonly digest: DigestFunction,
    private readonly logger: Logger,
    private readonly onSettled: (job: HashJob) => void
  ) {
    this.paths = paths;
    this.total = paths.length;
    this.concurrency = concurrency;

    let resolveDone: (summary: JobSummary) => void = () => {};
    this.done = new Promise((resolve) => {
      resolveDone = resolve;
    });
    this.resolveDone = resolveDone;
  }

  get state(): JobState {
    if (this.finished) return "idle";
    return this.controller.signal.aborted ? "cancelling" : "running";
  }

  get isFinished(): boolean {
    return this.finished;
  }

  onProgress(listener: ProgressListener): this {
    this.events.on("progress", listener);
    return this;
  }

  onResult(listener: ResultListener): this {
    this.events.on("result", listener);
    return this;
  }

  onFinished(listener: FinishedListener): this {
    this.events.on("finished", listener);
    return this;
  }

  /**
   * Requests cooperative cancellation. Files being read stop at their next
   * chunk and report "cancelled"; files not yet started are skipped and
   * produce no result. Safe to call repeatedly or after completion.
   */
  cancel(): void {
    if (this.finished || this.controller.signal.aborted) {
      return;
    }
    this.controller.abort();
    this.logger.info("Cancel requested");
  }

  /** @internal Called once by the engine that created the job. */
  start(): void {
    setImmediate(() => {
      this.run().catch((err) => this.logger.error(`Hashing job failed: ${errorMessage(err)}`));
    });
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    let next = 0;
    let completed = 0;
    let succeeded = 0;
    let failed = 0;

    try {
      this.emit("progress", 0, this.total);

      const worker = async (): Promise<void> => {
        while (!signal.aborted) {
          const current = next;
          next += 1;
          if (current >= this.paths.length) {
            return;
          }

          const result = await this.runTask(this.paths[current], signal);

          completed++;
          if (result.outcome.ok) {
            succeeded++;
          } else {
            failed++;
          }
          // Result and its progress tick leave together, with nothing in between.
          this.emit("result", result);
          this.emit("progress", completed, this.total);
        }
      };

      const workerCount = Math.min(this.concurrency, this.total);
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      const summary: JobSummary = {
        total: this.total,
        completed,
        succeeded,
        failed,
        cancelled: signal.aborted
      };
      this.finished = true;
      this.onSettled(this);
      this.logger.info(
        `${summary.cancelled ? "Cancelled" : "Finished"}: ${completed}/${this.total} file(s), ${failed} failed`
      );
      this.emit("finished", summary);
      this.resolveDone(summary);
    }
  }

  private async runTask(filePath: FilePath, signal: AbortSignal): Promise<HashResult> {
    const start = performance.now();
    try {
      const outcome = await this.digest(filePath, signal);
      if (outcome.ok) {
        this.logger.info(`Hashed ${filePath}`);
      } else {
        this.logger.warn(`Failed to hash ${filePath}: ${outcome.message}`);
      }
      return { path: filePath, outcome };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`Failed to hash ${filePath}: ${message}`);
      return {
        path: filePath,
        outcome: { ok: false, message, sizeBytes: 0, durationSeconds: (performance.now() - start) / 1000 }
      };
    }
  }

  private emit(event: "progress", completed: number, total: number): void;
  private emit(event: "result", result: HashResult): void;
  private emit(event: "finished", summary: JobSummary): void;
  private emit(event: string, ...args: unknown[]): void {
    try {
      this.events.emit(event, ...args);
    } catch (err) {
      this.logger.error(`Listener for "${event}" threw: ${errorMessage(err)}`);
    }
  }
}

/**
 * Runs at most one hashing job at a time over a bounded pool of workers.
 *
 * @example
 * const engine = new HashEngine();
 * const job = engine.submit(paths, 8);
 * job.onResult((r) => console.log(r.path, r.outcome.ok ? r.outcome.digest : r.outcome.message));
 * await job.done;
 */
export class HashEngine {
  private readonly digest: DigestFunction;
  private readonly logger: Logger;
  private active: HashJob | null = null;

  constructor(options: HashEngineOptions = {}) {
    this.digest = options.digest ?? digestFile;
    this.logger = options.logger ?? createLogger();
  }

  get state(): JobState {
    return this.active ? this.active.state : "idle";
  }

  get activeJob(): HashJob | null {
    return this.active;
  }

  /**
   * Starts hashing `paths` with `concurrency` workers.
   *
   * @throws JobStateError with code JOB_ACTIVE while another job is running or cancelling
   * @throws RangeError if concurrency is not a positive integer
   */
  submit(paths: readonly FilePath[], concurrency: number = defaultConcurrency()): HashJob {
    if (this.active) {
      throw new JobStateError("JOB_ACTIVE");
    }
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    const job = new HashJob([...paths], concurrency, this.digest, this.logger, (settled) => {
      if (this.active === settled) {
        this.active = null;
      }
    });
    this.active = job;
    this.logger.info(`Started hashing ${job.total} file(s) with ${concurrency} workers`);
    job.start();
    return job;
  }

  /** Cancels the active job, if any. */
  cancel(): void {
    this.active?.cancel();
  }
}
