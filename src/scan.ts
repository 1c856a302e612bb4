import fs from "fs";
import path from "path";
import { errorMessage } from "./errors";
import { createLogger, Logger } from "./logger";
import { CollectResult, CollectWarning, FilePath } from "./types";

const fsp = fs.promises;

/** Whether a symbolic link resolves to a regular file; dangling links do not. */
async function isFileLink(linkPath: string): Promise<boolean> {
  try {
    return (await fsp.stat(linkPath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively walks a directory tree and invokes a callback for each regular file.
 *
 * Entries are visited depth-first in name order, so the same tree always
 * yields the same sequence. A symbolic link is reported when it points at a
 * regular file; linked directories are never descended into, so link cycles
 * cannot loop the walk.
 * Unreadable directories are passed to `onError` and the walk continues.
 *
 * @param rootDir - Absolute path to directory to walk
 * @param onFile - Callback invoked with absolute path of each file found
 * @param onError - Callback invoked for each directory that cannot be read
 *
 * @example
 * await walkDirectory('/path/to/dir', (filePath) => {
 *   console.log(`Found: ${filePath}`);
 * });
 */
export async function walkDirectory(
  rootDir: string,
  onFile: (filePath: string) => void,
  onError?: (dirPath: string, err: unknown) => void
): Promise<void> {
  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    onError?.(rootDir, err);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(rootDir, entry.name);

    if (entry.isSymbolicLink()) {
      if (await isFileLink(fullPath)) {
        onFile(fullPath);
      }
      continue;
    }

    if (entry.isDirectory()) {
      await walkDirectory(fullPath, onFile, onError);
      continue;
    }

    if (entry.isFile()) {
      onFile(fullPath);
    }
  }
}

/**
 * Expands file and directory inputs into a deduplicated list of absolute file paths.
 *
 * Directories are walked recursively; files are taken as given. The first
 * occurrence of a path wins, whether it came from this input or an earlier
 * one. Inputs that do not exist or cannot be read are skipped and reported
 * in `warnings`.
 *
 * @param inputs - File or directory paths, relative ones resolved against the cwd
 * @param logger - Receives a warning per skipped input and a summary line
 * @param known - Paths already held by the caller; they are not collected again
 *
 * @example
 * const { paths, warnings } = await collectPaths(['notes.txt', 'photos']);
 */
export async function collectPaths(
  inputs: readonly string[],
  logger: Logger = createLogger(),
  known?: ReadonlySet<FilePath>
): Promise<CollectResult> {
  const seen = new Set<FilePath>(known);
  const paths: FilePath[] = [];
  const warnings: CollectWarning[] = [];

  const add = (filePath: FilePath): void => {
    if (!seen.has(filePath)) {
      seen.add(filePath);
      paths.push(filePath);
    }
  };

  const warn = (input: string, message: string): void => {
    warnings.push({ input, message });
    logger.warn(`${input}: ${message}`);
  };

  for (const input of inputs) {
    if (!input) {
      continue;
    }

    const absolute = path.resolve(input);

    let stats: fs.Stats;
    try {
      stats = await fsp.stat(absolute);
    } catch (err) {
      warn(absolute, `Path does not exist or is not accessible: ${errorMessage(err)}`);
      continue;
    }

    if (stats.isDirectory()) {
      logger.info(`Scanning directory: ${absolute}`);
      await walkDirectory(absolute, add, (dirPath, err) =>
        warn(dirPath, `Error reading directory: ${errorMessage(err)}`)
      );
    } else if (stats.isFile()) {
      add(absolute);
    } else {
      warn(absolute, "Not a regular file or directory");
    }
  }

  logger.info(`Collected ${paths.length} file(s) from ${inputs.length} path(s)`);
  return { paths, warnings };
}
