import {
  chmod,
  readFile,
  realpath,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { randomUUID } from "node:crypto";
import type { FormatOptions } from "../config/config.js";
import { FileReadError, FileWriteError, ensureError } from "../utils/errors.js";
import { getLogger } from "../utils/log.js";
import type { Change } from "./changes.js";
import { formatContent } from "./engine.js";
import { BufferSink, CountingSink } from "./sink.js";

export interface FormatResult {
  changes: Change[];
  /** New content; present only when changes were applied. */
  output?: Buffer;
}

export interface FileReport {
  path: string;
  changes: Change[];
}

/**
 * Formats a byte buffer in up to two passes.
 *
 * The first pass runs against a {@link CountingSink} to collect the changes
 * and the largest output size. Output bytes are produced by a second pass,
 * into a buffer of exactly that size, and only when not in dry-run mode and
 * something changed.
 */
export function formatBytes(
  input: Uint8Array,
  options: FormatOptions,
  dryRun: boolean,
): FormatResult {
  const counter = new CountingSink();
  const changes = formatContent(input, options, counter);

  if (dryRun || changes.length === 0) {
    return { changes };
  }

  const sink = new BufferSink(counter.maximumPosition);
  formatContent(input, options, sink);
  return { changes, output: sink.toBuffer() };
}

/**
 * Replaces a file's content through a temp file in the same directory and a
 * rename, keeping the original permission bits. The temp file is removed
 * when any step fails.
 */
async function writeAtomically(
  path: string,
  content: Uint8Array,
  mode: number,
): Promise<void> {
  const tmp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmp, content);
    await chmod(tmp, mode);
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
      getLogger("core:format-file").warn(
        { tmp, err: ensureError(cleanupError) },
        "could not remove temp file",
      );
    });
    throw err;
  }
}

/**
 * Formats a single file in place, or only reports the changes when `dryRun`.
 * A symbolic link is written through: its target receives the new content.
 *
 * @throws {FileReadError} If the file cannot be read
 * @throws {FileWriteError} If the formatted content cannot be written back
 */
export async function formatFile(
  path: string,
  options: FormatOptions,
  dryRun: boolean,
): Promise<FileReport> {
  const logger = getLogger("core:format-file");

  let target: string;
  let input: Buffer;
  let mode: number;
  try {
    target = await realpath(path);
    input = await readFile(target);
    mode = (await stat(target)).mode & 0o7777;
  } catch (err) {
    throw new FileReadError(path, ensureError(err));
  }

  const { changes, output } = formatBytes(input, options, dryRun);
  logger.debug(
    { path, bytes: input.length, changes: changes.length, dryRun },
    "formatted",
  );

  if (output) {
    try {
      await writeAtomically(target, output, mode);
    } catch (err) {
      throw new FileWriteError(path, ensureError(err));
    }
    logger.debug({ path: target, bytes: output.length }, "written");
  }

  return { path, changes };
}
