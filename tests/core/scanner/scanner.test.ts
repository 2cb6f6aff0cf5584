import { describe, it, expect, beforeEach } from "vitest";

import { Scanner, createScanner, createScanState, scanLine } from "@/core/scanner/scanner.js";

import type { ScanState } from "@/core/scanner/types.js";

describe("scanLine", () => {
  let state: ScanState;

  beforeEach(() => {
    state = createScanState();
  });

  describe("line comments", () => {
    it("removes a trailing comment and keeps the newline", () => {
      const result = scanLine("let x = 10; // This is a comment\n", 1, state);

      expect(result.output).toBe("let x = 10; \n");
      expect(result.events).toEqual([{ startLine: 1, endLine: 1, kind: "line" }]);
      expect(state.mode).toBe("normal");
    });

    it("deletes a full-line comment including its newline", () => {
      const result = scanLine("  // note\n", 4, state);

      expect(result.output).toBe("");
      expect(result.events).toEqual([{ startLine: 4, endLine: 4, kind: "line" }]);
      expect(state.mode).toBe("normal");
      expect(state.fullLineComment).toBe(false);
    });

    it("treats a comment after only tabs as a full-line comment", () => {
      expect(scanLine("\t\t// indented\n", 1, state).output).toBe("");
    });

    it("keeps a byte-order mark in front of a comment", () => {
      const result = scanLine("\uFEFF// license\n", 1, state);

      expect(result.output).toBe("\uFEFF\n");
      expect(result.events).toEqual([{ startLine: 1, endLine: 1, kind: "line" }]);
    });

    it("counts a next-line character as indentation", () => {
      expect(scanLine("\u0085// c\n", 1, state).output).toBe("");
    });

    it("counts no-break and ideographic spaces as indentation", () => {
      expect(scanLine("\u00A0\u3000// c\n", 1, state).output).toBe("");
    });

    it("keeps CRLF endings after an inline comment", () => {
      expect(scanLine("x = 1; // c\r\n", 1, state).output).toBe("x = 1; \r\n");
    });

    it("drops CRLF with a full-line comment", () => {
      expect(scanLine("// c\r\n", 1, state).output).toBe("");
    });

    it("stays in a line comment when the last line has no newline", () => {
      const result = scanLine("x // c", 9, state);

      expect(result.output).toBe("x ");
      expect(state.mode).toBe("lineComment");
    });

    it("passes a lone slash through", () => {
      const result = scanLine("let half = a / 2;\n", 1, state);

      expect(result.output).toBe("let half = a / 2;\n");
      expect(result.events).toEqual([]);
    });

    it("passes a slash at the very end of input through", () => {
      expect(scanLine("a/", 1, state).output).toBe("a/");
    });
  });

  describe("block comments", () => {
    it("removes an inline block comment", () => {
      const result = scanLine("let z = /* c */ 30;\n", 2, state);

      expect(result.output).toBe("let z =  30;\n");
      expect(result.events).toEqual([{ startLine: 2, endLine: 2, kind: "block" }]);
    });

    it("removes two block comments on one line", () => {
      const result = scanLine("/* comment1 */ code /* comment2 */\n", 1, state);

      expect(result.output).toBe(" code \n");
      expect(result.events).toEqual([
        { startLine: 1, endLine: 1, kind: "block" },
        { startLine: 1, endLine: 1, kind: "block" },
      ]);
    });

    it("leaves the newline of a line holding only a block comment", () => {
      expect(scanLine("/* c */\n", 1, state).output).toBe("\n");
    });

    it("reports one event spanning every line of a multi-line comment", () => {
      const lines = ["a\n", "b\n", "x /* start\n", "mid\n", "mid\n", "mid\n", "end */ y\n"];
      const outputs: string[] = [];
      const events = [];
      for (const [index, line] of lines.entries()) {
        const result = scanLine(line, index + 1, state);
        outputs.push(result.output);
        events.push(...result.events);
      }

      expect(outputs).toEqual(["a\n", "b\n", "x ", "", "", "", " y\n"]);
      expect(events).toEqual([{ startLine: 3, endLine: 7, kind: "block" }]);
      expect(state.blockStartLine).toBeNull();
    });

    it("does not nest block comments", () => {
      const result = scanLine("/* outer /* inner */ tail */\n", 1, state);

      expect(result.output).toBe(" tail */\n");
      expect(result.events).toHaveLength(1);
    });

    it("ends in block mode when the comment is never closed", () => {
      const result = scanLine("a /* open\n", 1, state);

      expect(result.output).toBe("a ");
      expect(result.events).toEqual([]);
      expect(state.mode).toBe("blockComment");
      expect(state.blockStartLine).toBe(1);
    });

    it("makes a full-line decision from output on the current line only", () => {
      scanLine("code(); /* opens\n", 1, state);
      const result = scanLine("closes */ // trailing\n", 2, state);

      expect(result.output).toBe("");
      expect(result.events).toEqual([
        { startLine: 1, endLine: 2, kind: "block" },
        { startLine: 2, endLine: 2, kind: "line" },
      ]);
    });
  });

  describe("string and character literals", () => {
    it("keeps comment markers inside a string", () => {
      const line = 'let s = "hello // not a comment";\n';
      const result = scanLine(line, 1, state);

      expect(result.output).toBe(line);
      expect(result.events).toEqual([]);
    });

    it("does not end a string at an escaped quote", () => {
      const line = '"say \\"hi\\" // not a comment"';
      const result = scanLine(line, 1, state);

      expect(result.output).toBe(line);
      expect(result.events).toEqual([]);
      expect(state.mode).toBe("normal");
    });

    it("keeps an escaped backslash from escaping the closing quote", () => {
      const result = scanLine('let p = "C:\\\\"; // path\n', 1, state);

      expect(result.output).toBe('let p = "C:\\\\"; \n');
      expect(result.events).toHaveLength(1);
    });

    it("keeps comment markers inside a character literal", () => {
      const result = scanLine("let c = '//'; /* comment */\n", 1, state);

      expect(result.output).toBe("let c = '//'; \n");
      expect(result.events).toEqual([{ startLine: 1, endLine: 1, kind: "block" }]);
    });

    it("handles an escaped quote in a character literal", () => {
      const line = "let q = '\\''; let r = 1;\n";
      const result = scanLine(line, 1, state);

      expect(result.output).toBe(line);
      expect(state.mode).toBe("normal");
    });

    it("carries an open string to the next line", () => {
      scanLine('let s = "first\n', 1, state);
      const result = scanLine('// still text" + x; // gone\n', 2, state);

      expect(result.output).toBe('// still text" + x; \n');
      expect(result.events).toEqual([{ startLine: 2, endLine: 2, kind: "line" }]);
    });
  });

  describe("raw strings", () => {
    it("keeps comment markers inside a raw string", () => {
      const line = 'let rs = r#"raw string /* not a comment */ // also not"#;\n';
      const result = scanLine(line, 1, state);

      expect(result.output).toBe(line);
      expect(result.events).toEqual([]);
      expect(state.mode).toBe("normal");
    });

    it("closes only at a quote followed by the full fence", () => {
      const result = scanLine('let v = r##"a"#b"##; // tail\n', 1, state);

      expect(result.output).toBe('let v = r##"a"#b"##; \n');
      expect(result.events).toEqual([{ startLine: 1, endLine: 1, kind: "line" }]);
    });

    it("stays open after a short closing fence", () => {
      const result = scanLine('r##"a"#b\n', 1, state);

      expect(result.output).toBe('r##"a"#b\n');
      expect(state.mode).toBe("rawString");
      expect(state.rawFence).toBe(2);
    });

    it("treats backslashes in raw strings as plain characters", () => {
      const result = scanLine('let re = r"\\d+"; // digits\n', 1, state);

      expect(result.output).toBe('let re = r"\\d+"; \n');
      expect(state.mode).toBe("normal");
    });

    it("resumes a raw string across lines", () => {
      scanLine('let doc = r#"line one\n', 1, state);
      const middle = scanLine("// inside the raw string\n", 2, state);
      const last = scanLine('end"#; // outside\n', 3, state);

      expect(middle.output).toBe("// inside the raw string\n");
      expect(middle.events).toEqual([]);
      expect(last.output).toBe('end"#; \n');
      expect(last.events).toEqual([{ startLine: 3, endLine: 3, kind: "line" }]);
      expect(state.rawFence).toBe(0);
    });

    it("emits an r with hashes but no quote literally", () => {
      const result = scanLine("r#x br#\n", 1, state);

      expect(result.output).toBe("r#x br#\n");
      expect(state.mode).toBe("normal");
    });

    it("scans a comment right after a false raw-string start", () => {
      const result = scanLine("bar// note\n", 1, state);

      expect(result.output).toBe("bar\n");
      expect(result.events).toHaveLength(1);
    });
  });
});

describe("Scanner", () => {
  it("numbers lines from 1 by default", () => {
    const scanner = new Scanner();
    scanner.feed("a\n");
    const result = scanner.feed("// b\n");

    expect(result.events).toEqual([{ startLine: 2, endLine: 2, kind: "line" }]);
    expect(scanner.lineNumber).toBe(2);
  });

  it("starts numbering at the given line", () => {
    const scanner = createScanner(10);
    const result = scanner.feed("x; // y\n");

    expect(result.events).toEqual([{ startLine: 10, endLine: 10, kind: "line" }]);
  });

  it("exposes the open block comment", () => {
    const scanner = createScanner();
    scanner.feed("/* license\n");
    scanner.feed("text\n");

    expect(scanner.mode).toBe("blockComment");
    expect(scanner.pendingBlockStart).toBe(1);
  });
});
