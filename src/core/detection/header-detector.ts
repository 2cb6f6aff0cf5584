/**
 * Header Detection
 *
 * Looks at the first lines of a file and guesses how many of them form a
 * header (license banner, doc comments, inner attributes) that should be
 * copied verbatim instead of scrubbed.
 */

import { createReadStream } from "fs";

import { InputError } from "../../lib/errors.js";
import { readLines, splitLines } from "../../lib/lines.js";
import { err, ok, tryCatchAsync } from "../../lib/result.js";
import { trimWhitespace } from "../../lib/whitespace.js";

import type { Result } from "../../lib/result.js";

// =============================================================================
// LINE CLASSIFICATION
// =============================================================================

export type HeaderLineKind =
  | "doc"      // //!, /// or #![
  | "comment"  // // or /*
  | "blank"
  | "code"     // starts with a declaration keyword
  | "other";

/** Declaration keywords that mark the end of a header */
export const CODE_KEYWORDS = [
  "use ",
  "mod ",
  "pub ",
  "fn ",
  "struct ",
  "enum ",
  "impl ",
  "trait ",
] as const;

const DOC_PREFIXES = ["#![", "//!", "///"] as const;
const COMMENT_PREFIXES = ["//", "/*"] as const;

export function classifyHeaderLine(line: string): HeaderLineKind {
  const trimmed = trimWhitespace(line);
  if (trimmed.length === 0) return "blank";
  if (DOC_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) return "doc";
  if (COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) return "comment";
  if (CODE_KEYWORDS.some((keyword) => trimmed.startsWith(keyword))) return "code";
  return "other";
}

// =============================================================================
// DETECTION
// =============================================================================

export const DEFAULT_MAX_HEADER_LINES = 50;
export const DEFAULT_PREVIEW_LINES = 10;

/** Consecutive blank lines tolerated after a comment before the header ends */
const MAX_BLANK_RUN = 2;

/** Non-comment lines tolerated at the top of a commented file */
const LEADING_LINE_ALLOWANCE = 3;

export interface HeaderDetectorOptions {
  /** Hard cap on lines examined */
  maxLines?: number;
  /** Lines shown in the preview */
  previewLines?: number;
}

export interface HeaderDecision {
  /** Lines to copy verbatim; 0 means no header */
  lineCount: number;
  /** First lines of the header, with a "... (N more lines)" suffix when cut */
  preview: string;
}

function stripTerminator(line: string): string {
  if (line.endsWith("\r\n")) return line.slice(0, -2);
  if (line.endsWith("\n")) return line.slice(0, -1);
  return line;
}

/**
 * Decide how many leading lines form a header.
 *
 * Accepts the whole source or its first lines; at most `maxLines` are read.
 */
export function detectHeader(
  source: string | readonly string[],
  options: HeaderDetectorOptions = {}
): HeaderDecision {
  const maxLines = options.maxLines ?? DEFAULT_MAX_HEADER_LINES;
  const previewLines = options.previewLines ?? DEFAULT_PREVIEW_LINES;
  const lines = typeof source === "string" ? splitLines(source) : source;

  const seen: string[] = [];
  let scanned = 0;
  let blankRun = 0;
  let sawComment = false;
  let cutoff: number | null = null;

  for (const raw of lines) {
    if (scanned >= maxLines) break;
    scanned++;

    const text = stripTerminator(raw);
    if (seen.length < previewLines) {
      seen.push(text);
    }

    const kind = classifyHeaderLine(text);

    if (kind === "blank") {
      blankRun++;
      if (blankRun > MAX_BLANK_RUN && sawComment) {
        cutoff = scanned - blankRun;
        break;
      }
      continue;
    }
    blankRun = 0;

    if (kind === "doc" || kind === "comment") {
      sawComment = true;
      continue;
    }

    if (kind === "code") {
      cutoff = scanned - 1;
      break;
    }

    // The line that ends the scan stays in the header
    if (scanned > LEADING_LINE_ALLOWANCE && sawComment) {
      cutoff = scanned;
      break;
    }
  }

  const lineCount = cutoff ?? (sawComment ? scanned : 0);
  return { lineCount, preview: buildPreview(seen, lineCount) };
}

function buildPreview(seen: readonly string[], lineCount: number): string {
  const shown = seen.slice(0, lineCount);
  const text = shown.join("\n");
  const hidden = lineCount - shown.length;
  return hidden > 0 ? `${text}\n... (${hidden} more lines)` : text;
}

/**
 * Run header detection on a file, reading no more lines than the cap.
 */
export async function detectHeaderInFile(
  filePath: string,
  options: HeaderDetectorOptions = {}
): Promise<Result<HeaderDecision, InputError>> {
  const maxLines = options.maxLines ?? DEFAULT_MAX_HEADER_LINES;

  const readResult = await tryCatchAsync(async () => {
    const lines: string[] = [];
    const stream = createReadStream(filePath, { encoding: "utf-8" });
    for await (const line of readLines(stream)) {
      lines.push(line);
      if (lines.length >= maxLines) break;
    }
    return lines;
  });

  if (!readResult.success) {
    return err(
      new InputError(`Failed to open file for header detection: ${readResult.error.message}`, filePath, {
        cause: readResult.error.message,
      })
    );
  }

  return ok(detectHeader(readResult.data, options));
}
