import chalk, { type ChalkInstance } from "chalk";
import { DEFAULT_CONFIG_PATH } from "../config/constants.js";
import { loadConfig } from "../config/loader.js";
import { resolveSettings, type SettingsInput } from "../config/config.js";
import { discoverFiles } from "../core/discovery.js";
import { formatFile, type FileReport } from "../core/format-file.js";
import {
  ExitCode,
  exitCodeFor,
  formatError,
  formatFileReport,
  formatSummary,
  createColors,
  summarize,
} from "../core/reporting.js";
import { ensureError } from "../utils/errors.js";
import { configureLogger, getLogger } from "../utils/log.js";

export interface FormatCommandOptions extends SettingsInput {
  checkOnly?: boolean;
  config?: string;
  verbose?: boolean;
}

function definedEntries(values: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  );
}

/**
 * Formats (or checks) every file under `paths` and prints the report.
 *
 * Files are processed one at a time and the first failure ends the run: a
 * file that cannot be read or written is never skipped silently.
 *
 * @returns Exit code: 0 on success, 1 when `--check-only` found files to
 *   reformat, 2 on any error
 */
export async function runFormatCommand(
  paths: string[],
  options: FormatCommandOptions,
): Promise<ExitCode> {
  const { checkOnly = false, config, verbose = false, ...flags } = options;
  if (verbose) configureLogger({ level: "debug" });
  const logger = getLogger("cli:format");

  let colors: ChalkInstance = chalk;
  try {
    const fileSettings = await loadConfig(
      config ?? DEFAULT_CONFIG_PATH,
      config !== undefined,
    );
    const settings = resolveSettings({
      ...fileSettings,
      ...definedEntries(flags),
    });
    colors = createColors(settings.color);
    logger.debug({ settings, checkOnly }, "resolved settings");

    const files = await discoverFiles(paths, settings.discovery);
    logger.debug({ count: files.length }, "discovered files");

    const reports: FileReport[] = [];
    for (const file of files) {
      const report = await formatFile(file, settings.format, checkOnly);
      reports.push(report);
      for (const line of formatFileReport(
        report,
        { dryRun: checkOnly, verbose },
        colors,
      )) {
        console.log(line);
      }
    }

    const summary = summarize(reports);
    console.log(formatSummary(summary, { dryRun: checkOnly }, colors));
    return exitCodeFor(summary, checkOnly);
  } catch (error) {
    console.error(formatError(ensureError(error), colors));
    return ExitCode.Error;
  }
}
