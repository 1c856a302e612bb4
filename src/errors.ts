export type JobStateErrorCode = "JOB_ACTIVE" | "QUEUE_LOCKED" | "EMPTY_QUEUE";

const MESSAGES: Record<JobStateErrorCode, string> = {
  JOB_ACTIVE: "job already active",
  QUEUE_LOCKED: "path queue cannot change while a job is active",
  EMPTY_QUEUE: "no paths queued"
};

/**
 * Raised synchronously when an operation is not allowed in the current job
 * state. The rejected call has no side effects.
 */
export class JobStateError extends Error {
  readonly code: JobStateErrorCode;

  constructor(code: JobStateErrorCode) {
    super(MESSAGES[code]);
    this.name = "JobStateError";
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
