import { escapeByte, type NonStandardWhitespace } from "./bytes.js";
import { describeLineEnding, type LineEnding } from "./line-ending.js";

/**
 * What happened to the content. Variants with data carry it as typed fields.
 */
export type ChangeKind =
  | { type: "eof-marker-added" }
  | { type: "eof-marker-removed" }
  | { type: "line-ending-replaced"; from: LineEnding; to: LineEnding }
  | { type: "trailing-whitespace-removed" }
  | { type: "leading-blank-lines-removed" }
  | { type: "trailing-blank-lines-removed" }
  | { type: "empty-file-replaced-with-one-line" }
  | { type: "whitespace-only-file-replaced-with-empty" }
  | { type: "whitespace-only-file-replaced-with-one-line" }
  | { type: "tab-replaced-with-spaces"; count: number }
  | { type: "tab-removed" }
  | {
      type: "nonstandard-whitespace-replaced-with-space";
      byte: NonStandardWhitespace;
    }
  | { type: "nonstandard-whitespace-removed"; byte: NonStandardWhitespace };

export type ChangeType = ChangeKind["type"];

/**
 * A single change, located by its 1-based line number in the output.
 */
export interface Change {
  readonly lineNumber: number;
  readonly kind: ChangeKind;
}

export function change(lineNumber: number, kind: ChangeKind): Change {
  return { lineNumber, kind };
}

type Phrase = { subject: string; predicate: string };

type ChangeKindMap = {
  [K in ChangeType]: Extract<ChangeKind, { type: K }>;
};

type PhraseTable = {
  [K in ChangeType]: (kind: ChangeKindMap[K]) => Phrase;
};

// "<subject> <predicate>" when applied, "<subject> would be <predicate>" when checking.
const PHRASES: PhraseTable = {
  "eof-marker-added": () => ({
    subject: "New line marker",
    predicate: "added to the end of the file.",
  }),
  "eof-marker-removed": () => ({
    subject: "New line marker",
    predicate: "removed from the end of the file.",
  }),
  "line-ending-replaced": ({ from, to }) => ({
    subject: `New line marker '${describeLineEnding(from)}'`,
    predicate: `replaced by '${describeLineEnding(to)}'.`,
  }),
  "trailing-whitespace-removed": () => ({
    subject: "Trailing whitespace",
    predicate: "removed.",
  }),
  "leading-blank-lines-removed": () => ({
    subject: "Empty line(s) at the beginning of the file",
    predicate: "removed.",
  }),
  "trailing-blank-lines-removed": () => ({
    subject: "Empty line(s) at the end of the file",
    predicate: "removed.",
  }),
  "empty-file-replaced-with-one-line": () => ({
    subject: "Empty file",
    predicate: "replaced with a single empty line.",
  }),
  "whitespace-only-file-replaced-with-empty": () => ({
    subject: "File",
    predicate: "replaced with an empty file.",
  }),
  "whitespace-only-file-replaced-with-one-line": () => ({
    subject: "File",
    predicate: "replaced with a single empty line.",
  }),
  "tab-replaced-with-spaces": ({ count }) => ({
    subject: "Tab",
    predicate: `replaced with ${String(count)} ${count === 1 ? "space" : "spaces"}.`,
  }),
  "tab-removed": () => ({ subject: "Tab", predicate: "removed." }),
  "nonstandard-whitespace-replaced-with-space": ({ byte }) => ({
    subject: `Non-standard whitespace character '${escapeByte(byte)}'`,
    predicate: "replaced by a space.",
  }),
  "nonstandard-whitespace-removed": ({ byte }) => ({
    subject: `Non-standard whitespace character '${escapeByte(byte)}'`,
    predicate: "removed.",
  }),
};

function phraseFor<K extends ChangeType>(
  type: K,
  kind: ChangeKindMap[K],
): Phrase {
  const build: PhraseTable[K] = PHRASES[type];
  return build(kind);
}

/**
 * Human-readable description of a change kind.
 *
 * @param dryRun - Use the prospective phrasing ("would be removed") instead of
 *   the past one ("removed")
 */
export function describeChange(kind: ChangeKind, dryRun: boolean): string {
  const { subject, predicate } = phraseFor(kind.type, kind);
  return `${subject}${dryRun ? " would be " : " "}${predicate}`;
}

/**
 * Renders a change as `line <n>: <description>`.
 */
export function formatChange(change: Change, dryRun: boolean): string {
  return `line ${String(change.lineNumber)}: ${describeChange(change.kind, dryRun)}`;
}
