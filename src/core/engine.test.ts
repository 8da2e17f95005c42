import { describe, it, expect } from "vitest";
import { formatContent } from "./engine.js";
import { BufferSink } from "./sink.js";
import {
  DEFAULT_FORMAT_OPTIONS,
  defineFormatOptions,
  type FormatOptions,
} from "../config/config.js";
import type { ChangeKind } from "./changes.js";

function format(input: string, options: FormatOptions) {
  const sink = new BufferSink();
  const changes = formatContent(Buffer.from(input, "latin1"), options, sink);
  return {
    output: sink.toBuffer().toString("latin1"),
    changes: changes.map((c) => [c.lineNumber, c.kind] as const),
  };
}

function run(input: string, overrides: Partial<FormatOptions> = {}) {
  return format(input, defineFormatOptions(overrides));
}

const kind = (type: ChangeKind["type"]) => ({ type });

describe("formatContent", () => {
  describe("with default options", () => {
    it("leaves regular content unchanged", () => {
      expect(run("hello\r\n\rworld  ")).toEqual({
        output: "hello\r\n\rworld  ",
        changes: [],
      });
    });

    it("leaves whitespace-only and empty files unchanged", () => {
      expect(run("  ")).toEqual({ output: "  ", changes: [] });
      expect(run("")).toEqual({ output: "", changes: [] });
    });
  });

  describe("adding the end-of-file marker", () => {
    it("appends the target marker after unterminated content", () => {
      expect(
        run("hello\r\n\rworld  ", { addEofMarker: true, lineEnding: "crlf" }),
      ).toEqual({
        output: "hello\r\n\rworld  \r\n",
        changes: [[3, kind("eof-marker-added")]],
      });
    });

    it("uses the detected marker in auto mode", () => {
      // one CRLF and one CR: the tie goes to CRLF
      expect(run("hello\r\n\rworld  ", { addEofMarker: true })).toEqual({
        output: "hello\r\n\rworld  \r\n",
        changes: [[3, kind("eof-marker-added")]],
      });
    });

    it.each([
      ["lf", "hello\r\n\rworld  \n"],
      ["cr", "hello\r\n\rworld  \r"],
    ] as const)("uses a fixed %s marker", (lineEnding, expected) => {
      expect(
        run("hello\r\n\rworld  ", { addEofMarker: true, lineEnding }),
      ).toEqual({
        output: expected,
        changes: [[3, kind("eof-marker-added")]],
      });
    });

    it("does nothing when the file already ends with a marker", () => {
      expect(run("hello\n", { addEofMarker: true })).toEqual({
        output: "hello\n",
        changes: [],
      });
    });
  });

  describe("removing the end-of-file marker", () => {
    it("removes the final marker", () => {
      expect(run("hello\r\n\rworld  \n", { removeEofMarker: true })).toEqual({
        output: "hello\r\n\rworld  ",
        changes: [[3, kind("eof-marker-removed")]],
      });
    });

    it("does nothing for unterminated or empty files", () => {
      expect(run("hello", { removeEofMarker: true })).toEqual({
        output: "hello",
        changes: [],
      });
      expect(run("", { removeEofMarker: true })).toEqual({
        output: "",
        changes: [],
      });
    });

    it("also removes trailing blank lines", () => {
      expect(run("hello  \n\r\n\r", { removeEofMarker: true })).toEqual({
        output: "hello  ",
        changes: [
          [2, kind("trailing-blank-lines-removed")],
          [1, kind("eof-marker-removed")],
        ],
      });
    });

    it("rewinds to the last non-empty line even without the blank-line rule", () => {
      const options: FormatOptions = {
        ...DEFAULT_FORMAT_OPTIONS,
        removeEofMarker: true,
      };
      expect(format("hello  \n\r\n\r", options)).toEqual({
        output: "hello  ",
        changes: [[1, kind("eof-marker-removed")]],
      });
    });
  });

  describe("normalizing line endings", () => {
    const input = "hello\r\n\rworld  \r\n";

    it("converts to the most common marker in auto mode", () => {
      expect(run(input, { normalizeLineEndings: true })).toEqual({
        output: "hello\r\n\r\nworld  \r\n",
        changes: [[2, { type: "line-ending-replaced", from: "cr", to: "crlf" }]],
      });
    });

    it("converts to Linux markers", () => {
      expect(
        run(input, { normalizeLineEndings: true, lineEnding: "lf" }),
      ).toEqual({
        output: "hello\n\nworld  \n",
        changes: [
          [1, { type: "line-ending-replaced", from: "crlf", to: "lf" }],
          [2, { type: "line-ending-replaced", from: "cr", to: "lf" }],
          [3, { type: "line-ending-replaced", from: "crlf", to: "lf" }],
        ],
      });
    });

    it("converts to MacOS markers", () => {
      expect(
        run(input, { normalizeLineEndings: true, lineEnding: "cr" }),
      ).toEqual({
        output: "hello\r\rworld  \r",
        changes: [
          [1, { type: "line-ending-replaced", from: "crlf", to: "cr" }],
          [3, { type: "line-ending-replaced", from: "crlf", to: "cr" }],
        ],
      });
    });

    it("keeps original markers when normalization is off", () => {
      expect(run(input, { lineEnding: "lf" })).toEqual({
        output: input,
        changes: [],
      });
    });
  });

  describe("removing trailing blank lines", () => {
    it("coalesces all trailing blank lines into one change", () => {
      expect(
        run("hello\r\n\rworld\r\n\n\n\n\n\n", { removeTrailingBlankLines: true }),
      ).toEqual({
        output: "hello\r\n\rworld\r\n",
        changes: [[4, kind("trailing-blank-lines-removed")]],
      });
    });

    it("keeps lines that contain only whitespace", () => {
      expect(
        run("hello\n  \n", { removeTrailingBlankLines: true }),
      ).toEqual({ output: "hello\n  \n", changes: [] });
    });
  });

  describe("removing leading blank lines", () => {
    it("drops empty lines before the first non-empty line", () => {
      expect(
        run("\n\r\n  \nhello\n", { removeLeadingBlankLines: true }),
      ).toEqual({
        output: "  \nhello\n",
        changes: [[1, kind("leading-blank-lines-removed")]],
      });
    });

    it("treats lines emptied by trailing whitespace removal as blank", () => {
      expect(
        run("\n\r\n  \nhello\n", {
          removeLeadingBlankLines: true,
          removeTrailingWhitespace: true,
        }),
      ).toEqual({
        output: "hello\n",
        changes: [
          [1, kind("leading-blank-lines-removed")],
          [1, kind("trailing-whitespace-removed")],
        ],
      });
    });

    it("keeps blank lines after the first non-empty line", () => {
      expect(
        run("a\n\nb\n", { removeLeadingBlankLines: true }),
      ).toEqual({ output: "a\n\nb\n", changes: [] });
    });
  });

  describe("removing trailing whitespace", () => {
    const options = { removeTrailingWhitespace: true };

    it("trims an unterminated single line", () => {
      expect(run("hello world   ", options)).toEqual({
        output: "hello world",
        changes: [[1, kind("trailing-whitespace-removed")]],
      });
    });

    it("trims the last line after mixed markers", () => {
      expect(run("hello\r\n\rworld   ", options)).toEqual({
        output: "hello\r\n\rworld",
        changes: [[3, kind("trailing-whitespace-removed")]],
      });
    });

    it("trims spaces and tabs on every line", () => {
      expect(run("hello \t  \r\n \t  \rworld   ", options)).toEqual({
        output: "hello\r\n\rworld",
        changes: [
          [1, kind("trailing-whitespace-removed")],
          [2, kind("trailing-whitespace-removed")],
          [3, kind("trailing-whitespace-removed")],
        ],
      });
    });

    it("reports only the lines that had trailing whitespace", () => {
      expect(run("hello world   \n\n   \n", options)).toEqual({
        output: "hello world\n\n\n",
        changes: [
          [1, kind("trailing-whitespace-removed")],
          [3, kind("trailing-whitespace-removed")],
        ],
      });
    });

    it("treats vertical tab and form feed as whitespace", () => {
      expect(run("hello world   \x0C  \n\n \x0B \n", options)).toEqual({
        output: "hello world\n\n\n",
        changes: [
          [1, kind("trailing-whitespace-removed")],
          [3, kind("trailing-whitespace-removed")],
        ],
      });
    });

    it("keeps the last marker when the final line is only whitespace", () => {
      expect(run("abc\n   ", options)).toEqual({
        output: "abc\n",
        changes: [[2, kind("trailing-whitespace-removed")]],
      });
    });

    it("reports removed non-standard whitespace before the trim", () => {
      expect(
        run("hello world   \x0C  \n\n \x0B \n", {
          ...options,
          nonStandardWhitespacePolicy: "remove",
        }),
      ).toEqual({
        output: "hello world\n\n\n",
        changes: [
          [1, { type: "nonstandard-whitespace-removed", byte: 0x0c }],
          [1, kind("trailing-whitespace-removed")],
          [3, { type: "nonstandard-whitespace-removed", byte: 0x0b }],
          [3, kind("trailing-whitespace-removed")],
        ],
      });
    });

    it("reports replaced non-standard whitespace before the trim", () => {
      expect(
        run("hello world   \x0C  \n\n \x0B \n", {
          ...options,
          nonStandardWhitespacePolicy: "replace-with-space",
        }),
      ).toEqual({
        output: "hello world\n\n\n",
        changes: [
          [1, { type: "nonstandard-whitespace-replaced-with-space", byte: 0x0c }],
          [1, kind("trailing-whitespace-removed")],
          [3, { type: "nonstandard-whitespace-replaced-with-space", byte: 0x0b }],
          [3, kind("trailing-whitespace-removed")],
        ],
      });
    });

    it("combines with trailing blank line removal", () => {
      expect(
        run("hello world   \n\n   \n", {
          ...options,
          removeTrailingBlankLines: true,
        }),
      ).toEqual({
        output: "hello world\n",
        changes: [
          [1, kind("trailing-whitespace-removed")],
          [3, kind("trailing-whitespace-removed")],
          [2, kind("trailing-blank-lines-removed")],
        ],
      });
    });
  });

  describe("trivial files", () => {
    it("replaces an empty file with one line", () => {
      expect(run("", { emptyFilePolicy: "one-line", lineEnding: "lf" })).toEqual(
        {
          output: "\n",
          changes: [[1, kind("empty-file-replaced-with-one-line")]],
        },
      );
    });

    it("keeps an empty file empty under the empty and ignore policies", () => {
      expect(run("", { emptyFilePolicy: "empty" })).toEqual({
        output: "",
        changes: [],
      });
      expect(run("", { emptyFilePolicy: "ignore" })).toEqual({
        output: "",
        changes: [],
      });
    });

    const whitespaceOnly = "\n\t \x0B \x0C \n  ";

    it("empties a whitespace-only file", () => {
      expect(run(whitespaceOnly, { whitespaceOnlyFilePolicy: "empty" })).toEqual(
        {
          output: "",
          changes: [[1, kind("whitespace-only-file-replaced-with-empty")]],
        },
      );
    });

    it("copies a whitespace-only file under the ignore policy", () => {
      expect(
        run(whitespaceOnly, {
          whitespaceOnlyFilePolicy: "ignore",
          removeTrailingWhitespace: true,
          tabPolicy: 0,
        }),
      ).toEqual({ output: whitespaceOnly, changes: [] });
    });

    it("replaces a whitespace-only file with one line", () => {
      expect(
        run(whitespaceOnly, { whitespaceOnlyFilePolicy: "one-line" }),
      ).toEqual({
        output: "\n",
        changes: [[1, kind("whitespace-only-file-replaced-with-one-line")]],
      });
    });

    it("reports nothing when the file already is that one line", () => {
      expect(run("\n", { whitespaceOnlyFilePolicy: "one-line" })).toEqual({
        output: "\n",
        changes: [],
      });
      expect(run("\r\n", { whitespaceOnlyFilePolicy: "one-line" })).toEqual({
        output: "\r\n",
        changes: [],
      });
    });

    it("reports a one-line file with a different marker", () => {
      expect(
        run("\r\n", { whitespaceOnlyFilePolicy: "one-line", lineEnding: "lf" }),
      ).toEqual({
        output: "\n",
        changes: [[1, kind("whitespace-only-file-replaced-with-one-line")]],
      });
    });
  });

  describe("tabs", () => {
    it("keeps tabs when the policy is negative", () => {
      expect(run("a\tb", { tabPolicy: -47 })).toEqual({
        output: "a\tb",
        changes: [],
      });
    });

    it("removes tabs when the policy is zero", () => {
      expect(run("\thello", { tabPolicy: 0 })).toEqual({
        output: "hello",
        changes: [[1, kind("tab-removed")]],
      });
    });

    it("replaces each tab with N spaces", () => {
      expect(run("\thello\n\t\tx", { tabPolicy: 3 })).toEqual({
        output: "   hello\n      x",
        changes: [
          [1, { type: "tab-replaced-with-spaces", count: 3 }],
          [2, { type: "tab-replaced-with-spaces", count: 3 }],
          [2, { type: "tab-replaced-with-spaces", count: 3 }],
        ],
      });
    });
  });

  describe("non-standard whitespace", () => {
    const input = "\x0B\x0Chello\t ";

    it("keeps vertical tab and form feed under the ignore policy", () => {
      expect(run(input, { nonStandardWhitespacePolicy: "ignore" })).toEqual({
        output: input,
        changes: [],
      });
    });

    it("replaces them with spaces", () => {
      expect(
        run(input, { nonStandardWhitespacePolicy: "replace-with-space" }),
      ).toEqual({
        output: "  hello\t ",
        changes: [
          [1, { type: "nonstandard-whitespace-replaced-with-space", byte: 0x0b }],
          [1, { type: "nonstandard-whitespace-replaced-with-space", byte: 0x0c }],
        ],
      });
    });

    it("removes them", () => {
      expect(run(input, { nonStandardWhitespacePolicy: "remove" })).toEqual({
        output: "hello\t ",
        changes: [
          [1, { type: "nonstandard-whitespace-removed", byte: 0x0b }],
          [1, { type: "nonstandard-whitespace-removed", byte: 0x0c }],
        ],
      });
    });
  });

  describe("idempotence", () => {
    const inputs = [
      "",
      " ",
      "\n",
      "\r\n",
      "\r",
      " \t\n\x0B\x0C",
      "\r\n\r\n\n",
      "hello",
      "hello\n",
      "hello  \n\n\n",
      "\n\n  hello\t\r\n\rworld \x0C\r\n\n",
      "a\r\nb\rc\n",
      "\tindented\n\t\n",
      "x\x0B\n\x0C\n \n",
      "\r\n\r\nfoo  \t",
      "trailing   ",
      "abc\n   ",
      "\t\nx",
    ];

    const optionSets: Partial<FormatOptions>[] = [
      {},
      { addEofMarker: true },
      { removeEofMarker: true },
      { normalizeLineEndings: true },
      { normalizeLineEndings: true, lineEnding: "cr" },
      { removeTrailingWhitespace: true },
      { removeLeadingBlankLines: true },
      { removeTrailingBlankLines: true },
      { emptyFilePolicy: "one-line" },
      { emptyFilePolicy: "one-line", whitespaceOnlyFilePolicy: "one-line" },
      { whitespaceOnlyFilePolicy: "empty" },
      { whitespaceOnlyFilePolicy: "one-line", lineEnding: "crlf" },
      { tabPolicy: 0 },
      { tabPolicy: 4 },
      { nonStandardWhitespacePolicy: "replace-with-space" },
      { nonStandardWhitespacePolicy: "remove" },
      {
        addEofMarker: true,
        normalizeLineEndings: true,
        lineEnding: "lf",
        removeTrailingWhitespace: true,
        removeLeadingBlankLines: true,
        removeTrailingBlankLines: true,
        emptyFilePolicy: "empty",
        whitespaceOnlyFilePolicy: "empty",
        tabPolicy: 2,
        nonStandardWhitespacePolicy: "remove",
      },
      {
        removeEofMarker: true,
        normalizeLineEndings: true,
        removeTrailingWhitespace: true,
        removeLeadingBlankLines: true,
        whitespaceOnlyFilePolicy: "one-line",
        tabPolicy: 0,
        nonStandardWhitespacePolicy: "replace-with-space",
      },
    ];

    it("produces output that a second pass leaves unchanged", () => {
      for (const overrides of optionSets) {
        for (const input of inputs) {
          const first = run(input, overrides);
          const second = run(first.output, overrides);
          expect(second, JSON.stringify({ input, overrides })).toEqual({
            output: first.output,
            changes: [],
          });
        }
      }
    });

    it("reports changes exactly when the output differs from the input", () => {
      for (const overrides of optionSets) {
        for (const input of inputs) {
          const { output, changes } = run(input, overrides);
          expect(
            changes.length === 0,
            JSON.stringify({ input, overrides }),
          ).toBe(output === input);
        }
      }
    });
  });
});
