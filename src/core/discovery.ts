import { lstat, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Stats } from "node:fs";
import { globby } from "globby";
import {
  DirectoryEntryReadError,
  DirectoryReadError,
  FileReadError,
  InputNotFoundError,
  InvalidFilterPatternError,
  ensureError,
  isNodeError,
} from "../utils/errors.js";
import { getLogger } from "../utils/log.js";

export interface DiscoveryOptions {
  /** Follow symbolic links given as input and found inside directories. */
  followSymlinks: boolean;
  /** Regular expression tested against each file path; matches are skipped. */
  exclude: string;
}

/**
 * @throws {InvalidFilterPatternError} If the pattern is not a valid regular expression
 */
export function compileExcludePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, "u");
  } catch (err) {
    throw new InvalidFilterPatternError(pattern, ensureError(err));
  }
}

async function statInput(path: string, follow: boolean): Promise<Stats> {
  try {
    return follow ? await stat(path) : await lstat(path);
  } catch (err) {
    if (isNodeError(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      throw new InputNotFoundError(path, err);
    }
    throw new FileReadError(path, ensureError(err));
  }
}

/**
 * Lists the files below `directory`, sorted, as paths joined onto `directory`.
 */
async function listDirectory(
  directory: string,
  followSymlinks: boolean,
): Promise<string[]> {
  try {
    const relPaths = await globby("**/*", {
      cwd: directory,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: followSymlinks,
      expandDirectories: false,
      gitignore: false,
      suppressErrors: false,
    });
    return relPaths.sort().map((relPath) => join(directory, relPath));
  } catch (err) {
    const error = ensureError(err);
    if (
      isNodeError(error) &&
      typeof error.path === "string" &&
      resolve(error.path) !== resolve(directory)
    ) {
      throw new DirectoryEntryReadError(directory, error.path, error);
    }
    throw new DirectoryReadError(directory, error);
  }
}

/**
 * Expands files and directories into the list of files to format.
 *
 * Directories are searched recursively, hidden files included. Symbolic links
 * are skipped unless `followSymlinks` is set. Paths matching the `exclude`
 * pattern are dropped. Input order is kept and duplicates are removed.
 *
 * @throws {InputNotFoundError} If an input path, or the target of an input
 *   symbolic link, does not exist
 * @throws {InvalidFilterPatternError} If `exclude` does not compile
 * @throws {DirectoryReadError} If a directory cannot be listed
 */
export async function discoverFiles(
  paths: readonly string[],
  options: DiscoveryOptions,
): Promise<string[]> {
  const logger = getLogger("core:discovery");
  const exclude = compileExcludePattern(options.exclude);
  const seen = new Set<string>();
  const files: string[] = [];

  const add = (file: string): void => {
    if (exclude.test(file)) {
      logger.debug({ file }, "excluded");
      return;
    }
    if (seen.has(file)) return;
    seen.add(file);
    files.push(file);
  };

  for (const input of paths) {
    const entry = await statInput(input, false);
    // A dangling link is reported as missing, followed or not.
    const target = entry.isSymbolicLink()
      ? await statInput(input, true)
      : entry;

    if (entry.isSymbolicLink() && !options.followSymlinks) {
      logger.debug({ path: input }, "skipping symbolic link");
      continue;
    }

    if (target.isFile()) {
      add(input);
    } else if (target.isDirectory()) {
      const found = await listDirectory(input, options.followSymlinks);
      found.forEach(add);
    } else {
      logger.debug({ path: input }, "skipping special file");
    }
  }

  return files;
}
