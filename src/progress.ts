import path from "path";
import { PROGRESS_INTERVAL_MS } from "./config";
import { formatDuration } from "./format";
import { JobSummary } from "./types";

/** Phase callbacks the CLI drives while it collects paths and runs a hash job. */
export interface ProgressReporter {
  /** Inputs are about to be expanded into file paths */
  startScanning(): void;

  /** Expansion done; `totalFiles` paths will be hashed */
  endScanning(totalFiles: number): void;

  /** The hash job was submitted with `workers` parallel digests */
  startHashing(totalFiles: number, workers: number): void;

  /** One more file settled, successfully or not */
  updateHashing(completed: number, total: number, currentFile?: string): void;

  /** The job's finished event, cancelled or not */
  endHashing(summary: JobSummary, elapsedSeconds: number): void;
}

/**
 * Writes collection and hashing progress to stderr. Hashing updates are
 * redrawn on one line at most every PROGRESS_INTERVAL_MS, except the last.
 */
class StderrProgressReporter implements ProgressReporter {
  private lastUpdate = 0;

  startScanning(): void {
    process.stderr.write("Collecting files...\n");
  }

  endScanning(totalFiles: number): void {
    process.stderr.write(`Files found: ${totalFiles}\n`);
  }

  startHashing(totalFiles: number, workers: number): void {
    process.stderr.write(`Hashing ${totalFiles} files with ${workers} workers...\n`);
  }

  updateHashing(completed: number, total: number, currentFile?: string): void {
    const now = Date.now();
    if (completed < total && now - this.lastUpdate < PROGRESS_INTERVAL_MS) return;
    this.lastUpdate = now;

    const percent = total === 0 ? "100.0" : ((completed / total) * 100).toFixed(1);
    const fileName = currentFile ? path.basename(currentFile) : "";
    const display = fileName
      ? `\rHashing: ${completed}/${total} (${percent}%) - ${fileName}`
      : `\rHashing: ${completed}/${total} (${percent}%)`;

    // trailing blanks overwrite a longer file name from the last redraw
    process.stderr.write(display + " ".repeat(20));
  }

  endHashing(summary: JobSummary, elapsedSeconds: number): void {
    const verb = summary.cancelled ? "cancelled" : "complete";
    process.stderr.write(
      `\rHashing ${verb}: ${summary.completed}/${summary.total} in ${formatDuration(elapsedSeconds)}.` +
        " ".repeat(30) +
        "\n"
    );
  }
}

/** Silent reporter for --quiet runs and non-TTY stderr. */
class NoOpProgressReporter implements ProgressReporter {
  startScanning(): void {}
  endScanning(_totalFiles: number): void {}
  startHashing(_totalFiles: number, _workers: number): void {}
  updateHashing(_completed: number, _total: number, _currentFile?: string): void {}
  endHashing(_summary: JobSummary, _elapsedSeconds: number): void {}
}

/** The stderr reporter when `enabled`, otherwise the silent one. */
export function createProgressReporter(enabled: boolean): ProgressReporter {
  return enabled ? new StderrProgressReporter() : new NoOpProgressReporter();
}
