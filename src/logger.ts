export type LogLevel = "silent" | "warn" | "info";

/**
 * Sink for diagnostic messages. Engine modules accept one so that hosts can
 * route or mute them.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const RANK: Record<LogLevel, number> = { silent: 0, warn: 1, info: 2 };

/**
 * Writes to stderr through console.error so stdout stays free for reports.
 */
class StderrLogger implements Logger {
  constructor(private readonly level: LogLevel) {}

  info(message: string): void {
    if (RANK[this.level] >= RANK.info) console.error(message);
  }

  warn(message: string): void {
    if (RANK[this.level] >= RANK.warn) console.error(`Warning: ${message}`);
  }

  error(message: string): void {
    if (this.level !== "silent") console.error(`Error: ${message}`);
  }
}

class SilentLogger implements Logger {
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_message: string): void {}
}

export const silentLogger: Logger = new SilentLogger();

export function createLogger(level: LogLevel = "warn"): Logger {
  return level === "silent" ? silentLogger : new StderrLogger(level);
}
