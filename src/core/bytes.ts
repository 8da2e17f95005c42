// ASCII codes the formatter cares about. Input is scanned as raw bytes.
export const TAB = 0x09;
export const LINE_FEED = 0x0a;
export const VERTICAL_TAB = 0x0b;
export const FORM_FEED = 0x0c;
export const CARRIAGE_RETURN = 0x0d;
export const SPACE = 0x20;

/**
 * Vertical tab and form feed: whitespace that editors rarely show.
 */
export type NonStandardWhitespace = typeof VERTICAL_TAB | typeof FORM_FEED;

export function isNonStandardWhitespace(
  byte: number,
): byte is NonStandardWhitespace {
  return byte === VERTICAL_TAB || byte === FORM_FEED;
}

export function isWhitespace(byte: number): boolean {
  return (
    byte === SPACE ||
    byte === TAB ||
    byte === LINE_FEED ||
    byte === CARRIAGE_RETURN ||
    isNonStandardWhitespace(byte)
  );
}

/**
 * True when every byte is whitespace. Empty input counts as whitespace-only.
 */
export function isWhitespaceOnly(input: Uint8Array): boolean {
  return input.every(isWhitespace);
}

const ESCAPES: Record<number, string> = {
  [TAB]: "\\t",
  [LINE_FEED]: "\\n",
  [VERTICAL_TAB]: "\\v",
  [FORM_FEED]: "\\f",
  [CARRIAGE_RETURN]: "\\r",
  [SPACE]: " ",
};

/**
 * Printable escape for a whitespace byte, e.g. `\v` for 0x0B.
 */
export function escapeByte(byte: number): string {
  return ESCAPES[byte] ?? `\\x${byte.toString(16).padStart(2, "0")}`;
}
