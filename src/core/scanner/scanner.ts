/**
 * Comment scanner
 *
 * A character-level state machine that removes line and block comments
 * while copying string, character and raw-string literals untouched.
 * Input arrives one line at a time; everything the machine needs to resume
 * on the next line lives in the caller-owned ScanState.
 */

import { isWhitespaceOnly } from "../../lib/whitespace.js";

import type { CommentEvent, LineScanResult, ScanMode, ScanState } from "./types.js";

/**
 * Create the state for a new file
 */
export function createScanState(): ScanState {
  return {
    mode: "normal",
    rawFence: 0,
    blockStartLine: null,
    fullLineComment: false,
  };
}

/**
 * Scan one line (including its terminator, if any).
 *
 * Must be called for every line of a file in order, with the same state.
 * Unterminated literals and comments are not errors: the state simply ends
 * the file in a mode other than "normal".
 */
export function scanLine(line: string, lineNumber: number, state: ScanState): LineScanResult {
  const events: CommentEvent[] = [];
  let output = "";
  let pos = 0;

  while (pos < line.length) {
    const ch = line.charAt(pos);
    const next = line.charAt(pos + 1);
    pos++;

    switch (state.mode) {
      case "normal":
        if (ch === "/" && next === "/") {
          pos++;
          // A comment on an otherwise blank line takes the whole line with it
          if (isWhitespaceOnly(output)) {
            output = "";
            state.fullLineComment = true;
          } else {
            state.fullLineComment = false;
          }
          state.mode = "lineComment";
          events.push({ startLine: lineNumber, endLine: lineNumber, kind: "line" });
        } else if (ch === "/" && next === "*") {
          pos++;
          state.mode = "blockComment";
          if (state.blockStartLine === null) {
            state.blockStartLine = lineNumber;
          }
        } else if (ch === '"') {
          output += ch;
          state.mode = "stringLiteral";
        } else if (ch === "'") {
          output += ch;
          state.mode = "charLiteral";
        } else if (ch === "r") {
          let fenceEnd = pos;
          while (line.charAt(fenceEnd) === "#") {
            fenceEnd++;
          }
          // r, r#, r## ... is emitted either way; only a quote opens a raw string
          output += line.slice(pos - 1, fenceEnd);
          if (line.charAt(fenceEnd) === '"') {
            output += '"';
            state.rawFence = fenceEnd - pos;
            state.mode = "rawString";
            pos = fenceEnd + 1;
          } else {
            pos = fenceEnd;
          }
        } else {
          output += ch;
        }
        break;

      case "lineComment":
        if (ch === "\n") {
          if (!state.fullLineComment) {
            output += ch;
          }
          state.mode = "normal";
          state.fullLineComment = false;
        } else if (ch === "\r" && next === "\n" && !state.fullLineComment) {
          output += ch;
        }
        break;

      case "blockComment":
        if (ch === "*" && next === "/") {
          pos++;
          state.mode = "normal";
          if (state.blockStartLine !== null) {
            events.push({ startLine: state.blockStartLine, endLine: lineNumber, kind: "block" });
            state.blockStartLine = null;
          }
        }
        break;

      case "stringLiteral":
        output += ch;
        if (ch === "\\") {
          state.mode = "stringEscape";
        } else if (ch === '"') {
          state.mode = "normal";
        }
        break;

      case "stringEscape":
        output += ch;
        state.mode = "stringLiteral";
        break;

      case "charLiteral":
        output += ch;
        if (ch === "\\") {
          state.mode = "charEscape";
        } else if (ch === "'") {
          state.mode = "normal";
        }
        break;

      case "charEscape":
        output += ch;
        state.mode = "charLiteral";
        break;

      case "rawString":
        output += ch;
        if (ch === '"') {
          let hashes = 0;
          while (hashes < state.rawFence && line.charAt(pos) === "#") {
            hashes++;
            pos++;
          }
          output += "#".repeat(hashes);
          if (hashes === state.rawFence) {
            state.mode = "normal";
            state.rawFence = 0;
          }
        }
        break;
    }
  }

  return { output, events };
}

/**
 * Convenience wrapper that owns a ScanState and numbers lines itself
 */
export class Scanner {
  private readonly state: ScanState = createScanState();
  private currentLine: number;

  constructor(firstLineNumber: number = 1) {
    this.currentLine = firstLineNumber - 1;
  }

  /**
   * Scan the next line of the file
   */
  feed(line: string): LineScanResult {
    this.currentLine++;
    return scanLine(line, this.currentLine, this.state);
  }

  /** Mode the scanner is in after the last line fed */
  get mode(): ScanMode {
    return this.state.mode;
  }

  /** Number of the last line fed (0 before the first line at default numbering) */
  get lineNumber(): number {
    return this.currentLine;
  }

  /** Start line of a block comment still open, null otherwise */
  get pendingBlockStart(): number | null {
    return this.state.blockStartLine;
  }
}

/**
 * Create a new Scanner instance
 */
export function createScanner(firstLineNumber?: number): Scanner {
  return new Scanner(firstLineNumber);
}
