#!/usr/bin/env node
import { parseArgs, CliOptions } from "./args";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";
import { createProgressReporter } from "./progress";
import { buildDuplicatesReport, formatStats } from "./report";

function printUsage(): void {
  console.error("Usage: dupehash [--workers N] [--quiet] [--verbose] <path...>");
  console.error("");
  console.error("  -w, --workers N   number of files hashed in parallel (default: CPU count x 2, 2..32)");
  console.error("  -q, --quiet       no progress output, warnings only");
  console.error("  -v, --verbose     log every collected directory and hashed file");
  console.error("  -h, --help        show this help");
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2), Boolean(process.stderr.isTTY));
  } catch (err) {
    console.error(errorMessage(err));
    printUsage();
    process.exitCode = 1;
    return;
  }

  if (options.help) {
    printUsage();
    return;
  }

  if (options.inputs.length === 0) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(options.logLevel);
  let interrupted = false;

  try {
    const result = await buildDuplicatesReport(options.inputs, {
      concurrency: options.concurrency,
      logger,
      progress: createProgressReporter(options.showProgress),
      onJob: (job) => {
        const onSigint = (): void => {
          interrupted = true;
          console.error("\nCancelling...");
          job.cancel();
        };
        process.once("SIGINT", onSigint);
        job.onFinished(() => process.removeListener("SIGINT", onSigint));
      }
    });

    if (result.report) {
      process.stdout.write(result.report);
    } else {
      console.log("No duplicates found.");
    }
    console.log(formatStats(result.stats));

    for (const failure of result.errors) {
      console.error(`Error hashing file: ${failure.path}: ${failure.message}`);
    }

    if (result.cancelled || interrupted || result.errors.length > 0) {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(`Failed to build duplicate report: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
