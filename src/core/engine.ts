import type { FormatOptions, TrivialFilePolicy } from "../config/config.js";
import {
  CARRIAGE_RETURN,
  LINE_FEED,
  SPACE,
  TAB,
  isNonStandardWhitespace,
  isWhitespaceOnly,
} from "./bytes.js";
import { change, type Change } from "./changes.js";
import {
  lineEndingAt,
  lineEndingBytes,
  resolveLineEnding,
  type LineEnding,
} from "./line-ending.js";
import type { OutputSink } from "./sink.js";

/**
 * Positions are offsets in the output sink. "incl"/"excl" say whether the
 * position is after or before the line's end-of-line marker.
 */
interface ScanState {
  lineNumber: number;
  endOfLineIncl: number;
  lastNonWhitespace: number;
  lastNonEmptyLineExcl: number;
  lastNonEmptyLineIncl: number;
  /** 0 until the first non-empty line has been terminated. */
  lastNonEmptyLineNumber: number;
  leadingBlankLinesRemoved: boolean;
}

function formatEmptyFile(
  policy: TrivialFilePolicy,
  marker: Uint8Array,
  sink: OutputSink,
): Change[] {
  if (policy !== "one-line") return [];
  sink.writeBytes(marker);
  return [change(1, { type: "empty-file-replaced-with-one-line" })];
}

function formatWhitespaceOnlyFile(
  input: Uint8Array,
  policy: TrivialFilePolicy,
  marker: Uint8Array,
  sink: OutputSink,
): Change[] {
  switch (policy) {
    case "ignore":
      sink.writeBytes(input);
      return [];
    case "empty":
      return [change(1, { type: "whitespace-only-file-replaced-with-empty" })];
    case "one-line": {
      sink.writeBytes(marker);
      const unchanged =
        input.length === marker.length &&
        input.every((byte, i) => byte === marker[i]);
      return unchanged
        ? []
        : [change(1, { type: "whitespace-only-file-replaced-with-one-line" })];
    }
  }
}

/**
 * Formats `input` into `sink` in a single forward pass and returns the list of
 * changes, in the order they were made.
 *
 * Running the function again on its own output with the same options yields
 * the same bytes and no changes. Only positions recorded during the scan are
 * ever rewound to.
 */
export function formatContent(
  input: Uint8Array,
  options: FormatOptions,
  sink: OutputSink,
): Change[] {
  const target: LineEnding = resolveLineEnding(options.lineEnding, input);
  const targetBytes = lineEndingBytes(target);

  if (input.length === 0) {
    return formatEmptyFile(options.emptyFilePolicy, targetBytes, sink);
  }
  if (isWhitespaceOnly(input)) {
    return formatWhitespaceOnlyFile(
      input,
      options.whitespaceOnlyFilePolicy,
      targetBytes,
      sink,
    );
  }

  const changes: Change[] = [];
  const state: ScanState = {
    lineNumber: 1,
    endOfLineIncl: 0,
    lastNonWhitespace: 0,
    lastNonEmptyLineExcl: 0,
    lastNonEmptyLineIncl: 0,
    lastNonEmptyLineNumber: 0,
    leadingBlankLinesRemoved: false,
  };

  const endLine = (lineEnding: LineEnding): void => {
    if (options.removeTrailingWhitespace) {
      const keep = Math.max(state.lastNonWhitespace, state.endOfLineIncl);
      if (keep < sink.position) {
        changes.push(
          change(state.lineNumber, { type: "trailing-whitespace-removed" }),
        );
        sink.rewind(keep);
      }
    }

    const isEmptyLine = sink.position === state.endOfLineIncl;

    if (
      isEmptyLine &&
      options.removeLeadingBlankLines &&
      state.lastNonEmptyLineNumber === 0
    ) {
      // The marker is dropped, so the line never reaches the output.
      if (!state.leadingBlankLinesRemoved) {
        changes.push(change(1, { type: "leading-blank-lines-removed" }));
        state.leadingBlankLinesRemoved = true;
      }
      return;
    }

    const endOfLineExcl = sink.position;
    if (options.normalizeLineEndings && lineEnding !== target) {
      changes.push(
        change(state.lineNumber, {
          type: "line-ending-replaced",
          from: lineEnding,
          to: target,
        }),
      );
      sink.writeBytes(targetBytes);
    } else {
      sink.writeBytes(lineEndingBytes(lineEnding));
    }
    state.endOfLineIncl = sink.position;

    if (!isEmptyLine) {
      state.lastNonEmptyLineExcl = endOfLineExcl;
      state.lastNonEmptyLineIncl = state.endOfLineIncl;
      state.lastNonEmptyLineNumber = state.lineNumber;
    }
    state.lineNumber++;
  };

  for (let i = 0; i < input.length; i++) {
    const byte = input[i] ?? 0;

    if (byte === CARRIAGE_RETURN || byte === LINE_FEED) {
      const lineEnding = lineEndingAt(input, i);
      if (lineEnding === "crlf") i++;
      endLine(lineEnding);
    } else if (byte === SPACE) {
      sink.write(byte);
    } else if (byte === TAB) {
      if (options.tabPolicy < 0) {
        sink.write(byte);
      } else if (options.tabPolicy > 0) {
        changes.push(
          change(state.lineNumber, {
            type: "tab-replaced-with-spaces",
            count: options.tabPolicy,
          }),
        );
        for (let n = 0; n < options.tabPolicy; n++) sink.write(SPACE);
      } else {
        changes.push(change(state.lineNumber, { type: "tab-removed" }));
      }
    } else if (isNonStandardWhitespace(byte)) {
      switch (options.nonStandardWhitespacePolicy) {
        case "ignore":
          sink.write(byte);
          break;
        case "replace-with-space":
          sink.write(SPACE);
          changes.push(
            change(state.lineNumber, {
              type: "nonstandard-whitespace-replaced-with-space",
              byte,
            }),
          );
          break;
        case "remove":
          changes.push(
            change(state.lineNumber, {
              type: "nonstandard-whitespace-removed",
              byte,
            }),
          );
          break;
      }
    } else {
      sink.write(byte);
      state.lastNonWhitespace = sink.position;
    }
  }

  // Trailing whitespace on the last, unterminated line.
  if (options.removeTrailingWhitespace) {
    const keep = Math.max(state.lastNonWhitespace, state.endOfLineIncl);
    if (keep < sink.position) {
      changes.push(
        change(state.lineNumber, { type: "trailing-whitespace-removed" }),
      );
      sink.rewind(keep);
    }
  }

  if (
    options.removeTrailingBlankLines &&
    state.endOfLineIncl === sink.position &&
    state.lastNonEmptyLineIncl < sink.position
  ) {
    state.lineNumber = state.lastNonEmptyLineNumber + 1;
    state.endOfLineIncl = state.lastNonEmptyLineIncl;
    changes.push(
      change(state.lineNumber, { type: "trailing-blank-lines-removed" }),
    );
    sink.rewind(state.lastNonEmptyLineIncl);
  }

  if (options.addEofMarker && state.endOfLineIncl < sink.position) {
    changes.push(change(state.lineNumber, { type: "eof-marker-added" }));
    sink.writeBytes(targetBytes);
    state.endOfLineIncl = sink.position;
    state.lineNumber++;
  }

  if (
    options.removeEofMarker &&
    state.endOfLineIncl === sink.position &&
    state.lineNumber >= 2
  ) {
    state.lineNumber = state.lastNonEmptyLineNumber;
    changes.push(change(state.lineNumber, { type: "eof-marker-removed" }));
    sink.rewind(state.lastNonEmptyLineExcl);
  }

  return changes;
}
