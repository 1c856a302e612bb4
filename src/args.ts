import { defaultConcurrency } from "./config";
import { LogLevel } from "./logger";

export interface CliOptions {
  inputs: string[];
  concurrency: number;
  logLevel: LogLevel;
  showProgress: boolean;
  help: boolean;
}

/**
 * Parses command-line arguments (without the node and script entries).
 *
 * @throws Error on unknown flags or an invalid worker count
 */
export function parseArgs(argv: readonly string[], isTTY = false): CliOptions {
  const options: CliOptions = {
    inputs: [],
    concurrency: defaultConcurrency(),
    logLevel: "warn",
    showProgress: isTTY,
    help: false
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "-q":
      case "--quiet":
        options.showProgress = false;
        break;
      case "-v":
      case "--verbose":
        options.logLevel = "info";
        break;
      case "-w":
      case "--workers": {
        const value = argv[i + 1];
        const workers = Number(value);
        if (value === undefined || !Number.isInteger(workers) || workers < 1) {
          throw new Error(`${arg} expects a positive integer`);
        }
        options.concurrency = workers;
        i++;
        break;
      }
      default:
        if (arg.startsWith("-") && arg !== "-") {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.inputs.push(arg);
    }
  }

  return options;
}
