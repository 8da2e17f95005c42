import { CARRIAGE_RETURN, LINE_FEED } from "./bytes.js";

/**
 * End-of-line encodings recognized by the formatter.
 * - `lf`: Linux, a single line feed (`\n`)
 * - `cr`: classic MacOS, a single carriage return (`\r`)
 * - `crlf`: Windows/DOS, carriage return followed by line feed (`\r\n`)
 */
export type LineEnding = "lf" | "cr" | "crlf";

/**
 * Target line ending for the output. `auto` picks the most common one in each file.
 */
export type LineEndingMode = "auto" | LineEnding;

const LINE_ENDING_BYTES: Record<LineEnding, Uint8Array> = {
  lf: Uint8Array.of(LINE_FEED),
  cr: Uint8Array.of(CARRIAGE_RETURN),
  crlf: Uint8Array.of(CARRIAGE_RETURN, LINE_FEED),
};

const LINE_ENDING_ESCAPES: Record<LineEnding, string> = {
  lf: "\\n",
  cr: "\\r",
  crlf: "\\r\\n",
};

export function lineEndingBytes(lineEnding: LineEnding): Uint8Array {
  return LINE_ENDING_BYTES[lineEnding];
}

/**
 * Visible representation used in reports, e.g. `\r\n`.
 */
export function describeLineEnding(lineEnding: LineEnding): string {
  return LINE_ENDING_ESCAPES[lineEnding];
}

/**
 * Decodes the line ending starting at `index`. The byte at `index` must be CR or LF.
 */
export function lineEndingAt(input: Uint8Array, index: number): LineEnding {
  if (input[index] === LINE_FEED) return "lf";
  return input[index + 1] === LINE_FEED ? "crlf" : "cr";
}

/**
 * Finds the most common line ending in the input.
 *
 * A CR immediately followed by LF is counted once, as CRLF. Ties are broken
 * in the order LF, CRLF, CR, so input without any line ending yields `lf`.
 */
export function detectLineEnding(input: Uint8Array): LineEnding {
  let lf = 0;
  let cr = 0;
  let crlf = 0;

  for (let i = 0; i < input.length; i++) {
    const byte = input[i];
    if (byte === CARRIAGE_RETURN) {
      if (input[i + 1] === LINE_FEED) {
        crlf++;
        i++;
      } else {
        cr++;
      }
    } else if (byte === LINE_FEED) {
      lf++;
    }
  }

  if (cr > crlf && cr > lf) return "cr";
  if (crlf > lf) return "crlf";
  return "lf";
}

/**
 * Resolves the concrete line ending to write for this input.
 */
export function resolveLineEnding(
  mode: LineEndingMode,
  input: Uint8Array,
): LineEnding {
  return mode === "auto" ? detectLineEnding(input) : mode;
}
