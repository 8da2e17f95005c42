import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { ColorMode } from "../config/config.js";
import { formatChange } from "./changes.js";
import type { FileReport } from "./format-file.js";

export interface ReportOptions {
  dryRun: boolean;
  verbose: boolean;
}

export interface RunSummary {
  changed: number;
  unchanged: number;
}

/**
 * Exit codes of the command-line tool.
 */
export const ExitCode = {
  Success: 0,
  ChangesPending: 1,
  Error: 2,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function createColors(mode: ColorMode): ChalkInstance {
  switch (mode) {
    case "auto":
      return chalk;
    case "off":
      return new Chalk({ level: 0 });
    case "on":
      return new Chalk({ level: chalk.level > 0 ? chalk.level : 1 });
  }
}

function plural(count: number, noun: string): string {
  return `${String(count)} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * Lines describing one file: a header and one indented line per change.
 * Unchanged files produce lines only in verbose mode.
 */
export function formatFileReport(
  report: FileReport,
  options: ReportOptions,
  colors: ChalkInstance,
): string[] {
  const path = colors.bold(report.path);
  if (report.changes.length === 0) {
    return options.verbose ? [`${colors.dim("Unchanged")} ${path}`] : [];
  }

  const header = options.dryRun
    ? `${colors.yellow("Would reformat")} ${path}`
    : `${colors.green("Reformatted")} ${path}`;
  const lines = report.changes.map(
    (change) => `  ${colors.dim("↳")} ${formatChange(change, options.dryRun)}`,
  );
  return [header, ...lines];
}

export function summarize(reports: readonly FileReport[]): RunSummary {
  const changed = reports.filter((r) => r.changes.length > 0).length;
  return { changed, unchanged: reports.length - changed };
}

/**
 * Final line of the report, e.g. `2 files reformatted, 1 file left unchanged.`
 */
export function formatSummary(
  summary: RunSummary,
  options: Pick<ReportOptions, "dryRun">,
  colors: ChalkInstance,
): string {
  const { changed, unchanged } = summary;
  if (changed + unchanged === 0) return "No files to process.";

  const changedText = options.dryRun
    ? `${plural(changed, "file")} would be reformatted`
    : `${plural(changed, "file")} reformatted`;
  const unchangedText = options.dryRun
    ? `${plural(unchanged, "file")} would be left unchanged`
    : `${plural(unchanged, "file")} left unchanged`;

  const colored =
    changed > 0 ? colors.bold(changedText) : colors.dim(changedText);
  return `${colored}, ${unchangedText}.`;
}

/**
 * Exit code for a finished run: pending changes in dry-run mode are a failure.
 */
export function exitCodeFor(summary: RunSummary, dryRun: boolean): ExitCode {
  return dryRun && summary.changed > 0
    ? ExitCode.ChangesPending
    : ExitCode.Success;
}

export function formatError(error: Error, colors: ChalkInstance): string {
  return `${colors.bold.red("error:")} ${error.message}`;
}
