import { z } from "zod";
import type { LineEnding, LineEndingMode } from "../core/line-ending.js";
import { InvalidOptionsError } from "../utils/errors.js";

/**
 * A regular expression that does not match any path.
 */
export const UNMATCHABLE_REGEX = "$.";

export const NEW_LINE_MARKER_MODES = [
  "auto",
  "linux",
  "mac-os",
  "windows",
] as const;
export const TRIVIAL_FILE_MODES = ["ignore", "empty", "one-line"] as const;
export const NON_STANDARD_WHITESPACE_MODES = [
  "ignore",
  "replace-with-space",
  "remove",
] as const;
export const COLOR_MODES = ["auto", "off", "on"] as const;

export type NewLineMarkerMode = (typeof NEW_LINE_MARKER_MODES)[number];
export type TrivialFilePolicy = (typeof TRIVIAL_FILE_MODES)[number];
export type NonStandardWhitespacePolicy =
  (typeof NON_STANDARD_WHITESPACE_MODES)[number];
export type ColorMode = (typeof COLOR_MODES)[number];

const MARKER_TO_LINE_ENDING: Record<
  Exclude<NewLineMarkerMode, "auto">,
  LineEnding
> = {
  linux: "lf",
  "mac-os": "cr",
  windows: "crlf",
};

/**
 * Resolved options for formatting a single file. Read-only once built.
 */
export interface FormatOptions {
  readonly addEofMarker: boolean;
  readonly removeEofMarker: boolean;
  readonly normalizeLineEndings: boolean;
  readonly lineEnding: LineEndingMode;
  readonly removeTrailingWhitespace: boolean;
  readonly removeLeadingBlankLines: boolean;
  readonly removeTrailingBlankLines: boolean;
  readonly emptyFilePolicy: TrivialFilePolicy;
  readonly whitespaceOnlyFilePolicy: TrivialFilePolicy;
  /** Negative keeps tabs, 0 removes them, N > 0 replaces each with N spaces. */
  readonly tabPolicy: number;
  readonly nonStandardWhitespacePolicy: NonStandardWhitespacePolicy;
}

export const DEFAULT_FORMAT_OPTIONS: FormatOptions = Object.freeze({
  addEofMarker: false,
  removeEofMarker: false,
  normalizeLineEndings: false,
  lineEnding: "auto",
  removeTrailingWhitespace: false,
  removeLeadingBlankLines: false,
  removeTrailingBlankLines: false,
  emptyFilePolicy: "ignore",
  whitespaceOnlyFilePolicy: "ignore",
  tabPolicy: -1,
  nonStandardWhitespacePolicy: "ignore",
});

/**
 * Option combinations that would make formatting non-idempotent or contradictory.
 */
export function findOptionConflicts(options: FormatOptions): string[] {
  const conflicts: string[] = [];
  if (options.addEofMarker && options.removeEofMarker) {
    conflicts.push(
      "'--add-new-line-marker-at-end-of-file' cannot be used with '--remove-new-line-marker-from-end-of-file'",
    );
  }
  if (
    options.emptyFilePolicy === "one-line" &&
    options.whitespaceOnlyFilePolicy === "empty"
  ) {
    conflicts.push(
      "'--normalize-whitespace-only-files=empty' cannot be used with '--normalize-empty-files=one-line'",
    );
  }
  return conflicts;
}

/**
 * Builds frozen format options from defaults plus overrides.
 * Removing the end-of-file marker implies removing trailing blank lines.
 *
 * @throws {InvalidOptionsError} If the combination is not allowed
 */
export function defineFormatOptions(
  overrides: Partial<FormatOptions> = {},
): FormatOptions {
  const merged: FormatOptions = { ...DEFAULT_FORMAT_OPTIONS, ...overrides };
  const options: FormatOptions = Object.freeze({
    ...merged,
    removeTrailingBlankLines:
      merged.removeTrailingBlankLines || merged.removeEofMarker,
  });
  const conflicts = findOptionConflicts(options);
  if (conflicts.length > 0) throw new InvalidOptionsError(conflicts);
  return options;
}

/**
 * Settings accepted from the config file and the command line.
 * Keys match the camel-cased long option names.
 */
export const Settings = z
  .object({
    followSymlinks: z.boolean().default(false),
    exclude: z
      .string()
      .default(UNMATCHABLE_REGEX)
      .describe("Regular expression evaluated on the path of each file."),
    color: z.enum(COLOR_MODES).default("auto"),
    newLineMarker: z.enum(NEW_LINE_MARKER_MODES).default("auto"),
    addNewLineMarkerAtEndOfFile: z.boolean().default(false),
    removeNewLineMarkerFromEndOfFile: z.boolean().default(false),
    normalizeNewLineMarkers: z.boolean().default(false),
    removeTrailingWhitespace: z.boolean().default(false),
    removeLeadingEmptyLines: z.boolean().default(false),
    removeTrailingEmptyLines: z.boolean().default(false),
    normalizeEmptyFiles: z.enum(TRIVIAL_FILE_MODES).default("ignore"),
    normalizeWhitespaceOnlyFiles: z.enum(TRIVIAL_FILE_MODES).default("ignore"),
    normalizeNonStandardWhitespace: z
      .enum(NON_STANDARD_WHITESPACE_MODES)
      .default("ignore"),
    replaceTabsWithSpaces: z
      .number()
      .int("replaceTabsWithSpaces must be an integer")
      .default(-1),
  })
  .strip();

export type SettingsInput = z.input<typeof Settings>;
export type Settings = z.output<typeof Settings>;

/**
 * Settings split by concern and converted to the formatter's vocabulary.
 */
export interface ResolvedSettings {
  format: FormatOptions;
  discovery: { followSymlinks: boolean; exclude: string };
  color: ColorMode;
}

export function toLineEndingMode(marker: NewLineMarkerMode): LineEndingMode {
  return marker === "auto" ? "auto" : MARKER_TO_LINE_ENDING[marker];
}

function resolve(settings: Settings): ResolvedSettings {
  return {
    format: defineFormatOptions({
      addEofMarker: settings.addNewLineMarkerAtEndOfFile,
      removeEofMarker: settings.removeNewLineMarkerFromEndOfFile,
      normalizeLineEndings: settings.normalizeNewLineMarkers,
      lineEnding: toLineEndingMode(settings.newLineMarker),
      removeTrailingWhitespace: settings.removeTrailingWhitespace,
      removeLeadingBlankLines: settings.removeLeadingEmptyLines,
      removeTrailingBlankLines: settings.removeTrailingEmptyLines,
      emptyFilePolicy: settings.normalizeEmptyFiles,
      whitespaceOnlyFilePolicy: settings.normalizeWhitespaceOnlyFiles,
      tabPolicy: settings.replaceTabsWithSpaces,
      nonStandardWhitespacePolicy: settings.normalizeNonStandardWhitespace,
    }),
    discovery: {
      followSymlinks: settings.followSymlinks,
      exclude: settings.exclude,
    },
    color: settings.color,
  };
}

/**
 * Validate raw settings and resolve them.
 *
 * @throws {InvalidOptionsError} With one entry per validation issue or
 *   conflicting pair of options
 */
export function resolveSettings(input: unknown): ResolvedSettings {
  const result = Settings.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    );
    throw new InvalidOptionsError(issues, result.error);
  }
  return resolve(result.data);
}

/**
 * Parse and validate a configuration file's content. Unlike
 * {@link resolveSettings}, defaults are not applied so the file can be
 * layered under command-line flags.
 *
 * @throws {SyntaxError} If the content is not JSON
 * @throws {ZodError} If a key has a value of the wrong type
 */
export function parseConfig(jsonContent: string): SettingsInput {
  const data: unknown = JSON.parse(jsonContent);
  const result = Settings.partial().safeParse(data);
  if (!result.success) throw result.error;
  return result.data;
}
