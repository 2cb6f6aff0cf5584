/**
 * Scanner types
 *
 * Defines the lexical modes the comment scanner moves through and the
 * records it hands back to callers.
 */

/**
 * Lexical modes, in the order they are documented
 */
export const SCAN_MODES = [
  "normal",
  "lineComment",
  "blockComment",
  "stringLiteral",
  "stringEscape",
  "charLiteral",
  "charEscape",
  "rawString",
] as const;

export type ScanMode = (typeof SCAN_MODES)[number];

export const COMMENT_KINDS = ["line", "block"] as const;

export type CommentKind = (typeof COMMENT_KINDS)[number];

/**
 * State threaded from one line to the next.
 *
 * One instance per file; the caller owns it and passes it to every
 * `scanLine` call in file order.
 */
export interface ScanState {
  /** Classification of the last character processed */
  mode: ScanMode;
  /** Number of `#` marks that opened the current raw string */
  rawFence: number;
  /** Line where the open block comment began, null when none is open */
  blockStartLine: number | null;
  /** Whether the open line comment started a whitespace-only line */
  fullLineComment: boolean;
}

/**
 * One removed comment
 */
export interface CommentEvent {
  readonly startLine: number;
  readonly endLine: number;
  readonly kind: CommentKind;
}

/**
 * Result of scanning a single line
 */
export interface LineScanResult {
  /** The line with comments removed */
  output: string;
  /** Comments whose removal completed on this line */
  events: CommentEvent[];
}
