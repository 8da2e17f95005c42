import {
  InvalidArgumentError,
  Option,
  type Command,
} from "@commander-js/extra-typings";
import {
  COLOR_MODES,
  NEW_LINE_MARKER_MODES,
  NON_STANDARD_WHITESPACE_MODES,
  TRIVIAL_FILE_MODES,
  UNMATCHABLE_REGEX,
} from "../config/config.js";
import type { ExitCode } from "../core/reporting.js";
import { runFormatCommand } from "./run-format-command.js";

export function parseInteger(value: string): number {
  if (!/^-?\d+$/u.test(value)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

export function registerFormatCommand(
  program: Command,
  onExit: (code: ExitCode) => void,
): void {
  program
    .command("format", { isDefault: true })
    .description("Format whitespace in files (default)")
    .argument(
      "<paths...>",
      "files and/or directories to process; directories are searched recursively",
    )
    .option(
      "--check-only",
      "do not format files; only report which files would be formatted (exit code 1 if any would)",
    )
    .option("--follow-symlinks", "follow symbolic links when searching for files")
    .option(
      "--exclude <regex>",
      `regular expression evaluated on the path of each file; matching files are skipped (default: "${UNMATCHABLE_REGEX}", matches nothing)`,
    )
    .addOption(
      new Option("--color <mode>", "enable or disable colored output").choices(
        COLOR_MODES,
      ),
    )
    .addOption(
      new Option(
        "--new-line-marker <marker>",
        "new line marker to use; auto picks the most common one in each file",
      ).choices(NEW_LINE_MARKER_MODES),
    )
    .option(
      "--add-new-line-marker-at-end-of-file",
      "add a new line marker at the end of the file if it is missing",
    )
    .option(
      "--remove-new-line-marker-from-end-of-file",
      "remove all new line markers from the end of each file; implies --remove-trailing-empty-lines",
    )
    .option(
      "--normalize-new-line-markers",
      "make new line markers the same within each file",
    )
    .option(
      "--remove-trailing-whitespace",
      "remove whitespace at the end of each line",
    )
    .option(
      "--remove-leading-empty-lines",
      "remove empty lines at the beginning of each file",
    )
    .option(
      "--remove-trailing-empty-lines",
      "remove empty lines at the end of each file",
    )
    .addOption(
      new Option(
        "--normalize-empty-files <mode>",
        "replace files of zero length",
      ).choices(TRIVIAL_FILE_MODES),
    )
    .addOption(
      new Option(
        "--normalize-whitespace-only-files <mode>",
        "replace files consisting of whitespace only",
      ).choices(TRIVIAL_FILE_MODES),
    )
    .addOption(
      new Option(
        "--normalize-non-standard-whitespace <mode>",
        "replace or remove the non-standard whitespace characters \\v and \\f",
      ).choices(NON_STANDARD_WHITESPACE_MODES),
    )
    .option(
      "--replace-tabs-with-spaces <n>",
      "replace each tab with n spaces; 0 removes tabs, negative keeps them (default: -1)",
      parseInteger,
    )
    .option(
      "-c, --config <path>",
      "path to a JSON configuration file; command-line flags take precedence",
    )
    .option("--verbose", "list unchanged files and print debug logs to stderr")
    .addHelpText(
      "after",
      "\nThis is the default command when no subcommand is specified.",
    )
    .action(async (paths, options) => {
      onExit(await runFormatCommand(paths, options));
    });
}
