/**
 * Context attached to a failed operation.
 */
interface FormatErrorDetails {
  action?: "stat" | "read" | "write" | "readdir" | "compile" | "validate";
  path?: string;
}

/**
 * Base class for every fatal error of a formatting run.
 */
export class FormatError extends Error {
  readonly details: FormatErrorDetails;

  constructor(
    message: string,
    details: FormatErrorDetails = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.details = details;
  }
}

/**
 * A path given on the command line does not exist.
 */
export class InputNotFoundError extends FormatError {
  constructor(path: string, cause?: Error) {
    super(`File not found ${path}.`, { action: "stat", path }, cause);
  }
}

export class DirectoryReadError extends FormatError {
  constructor(path: string, cause?: Error) {
    super(
      `Failed to read directory ${path}.`,
      { action: "readdir", path },
      cause,
    );
  }
}

export class DirectoryEntryReadError extends FormatError {
  constructor(directory: string, entry: string, cause?: Error) {
    super(
      `Failed to read an entry in directory ${directory}: ${entry}.`,
      { action: "stat", path: entry },
      cause,
    );
  }
}

export class FileReadError extends FormatError {
  constructor(path: string, cause?: Error) {
    super(`Cannot read ${path}.`, { action: "read", path }, cause);
  }
}

export class FileWriteError extends FormatError {
  constructor(path: string, cause?: Error) {
    super(`Cannot write ${path}.`, { action: "write", path }, cause);
  }
}

/**
 * The `--exclude` regular expression does not compile.
 */
export class InvalidFilterPatternError extends FormatError {
  readonly pattern: string;

  constructor(pattern: string, cause?: Error) {
    super(
      `Invalid regular expression '${pattern}'${cause ? `: ${cause.message}` : ""}.`,
      { action: "compile" },
      cause,
    );
    this.pattern = pattern;
  }
}

/**
 * Options that are individually valid but cannot be used together, or that
 * fail schema validation.
 */
export class InvalidOptionsError extends FormatError {
  readonly issues: string[];

  constructor(issues: string[], cause?: Error) {
    const list = issues.map((issue) => `  • ${issue}`).join("\n");
    super(`Invalid options:\n${list}`, { action: "validate" }, cause);
    this.issues = issues;
  }
}

/**
 * Error thrown when an explicitly requested config file is not found.
 */
export class ConfigNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(
      `Config file not found at ${path}.\nCheck the path, or create one with 'whitespace-format init --config <path>'.`,
    );
    this.name = this.constructor.name;
    this.path = path;
  }
}

/**
 * Error thrown when config file cannot be parsed or is invalid.
 */
export class ConfigParseError extends Error {
  readonly path: string;
  readonly originalError?: Error;

  constructor(path: string, originalError?: Error) {
    const base = originalError
      ? `Failed to load config from ${path}: ${originalError.message}`
      : `Failed to parse config from ${path}`;
    const hint =
      "Fix the JSON and option values, then retry.\nTry 'whitespace-format --help' for the accepted values.";
    const baseWithPeriod = /[.!?]$/u.test(base) ? base : `${base}.`;
    super(`${baseWithPeriod}\n${hint}`, { cause: originalError });
    this.name = this.constructor.name;
    this.path = path;
    this.originalError = originalError;
  }
}

/**
 * Ensures that an unknown caught value is an Error object.
 * @param e - The unknown value to ensure is an Error
 */
export function ensureError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Type guard to safely check if an error is a Node.js ErrnoException
 * @param e - The error to check
 */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return (
    e instanceof Error &&
    "code" in e &&
    (typeof e.code === "string" || typeof e.code === "number")
  );
}
