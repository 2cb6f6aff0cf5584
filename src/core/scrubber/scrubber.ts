/**
 * Scrubber
 *
 * Drives the scanner over a whole file: copies the header verbatim, numbers
 * the remaining lines, threads one scan state through them and collects the
 * removed-comment events. The in-memory and streaming entry points share the
 * same Scrubber so they cannot drift apart.
 */

import { pipeline } from "stream/promises";

import { readLines, splitLines } from "../../lib/lines.js";
import { createScanner } from "../scanner/scanner.js";

import type { Writable } from "stream";
import type { Scanner } from "../scanner/scanner.js";
import type { CommentEvent, ScanMode } from "../scanner/types.js";

export interface ScrubOptions {
  /** Leading lines to copy without scanning */
  headerLines?: number;
}

export interface ScrubStats {
  lineComments: number;
  blockComments: number;
}

export interface ScrubReport {
  /** Header lines actually copied (fewer than requested for short files) */
  headerLines: number;
  /** Lines passed through the scanner */
  bodyLines: number;
  /** Removed comments in file order */
  events: CommentEvent[];
  stats: ScrubStats;
  /** Scanner mode at end of input; anything but "normal" means an unterminated construct */
  finalMode: ScanMode;
  /** Start line of a block comment left open at end of input */
  unterminatedBlockStart: number | null;
}

export interface ScrubTextResult {
  output: string;
  report: ScrubReport;
}

export function countEvents(events: readonly CommentEvent[]): ScrubStats {
  let lineComments = 0;
  let blockComments = 0;
  for (const event of events) {
    if (event.kind === "line") {
      lineComments++;
    } else {
      blockComments++;
    }
  }
  return { lineComments, blockComments };
}

/**
 * Line-at-a-time scrubbing for one file
 */
export class Scrubber {
  private readonly headerLimit: number;
  private headerCopied = 0;
  private bodyLines = 0;
  private scanner: Scanner | null = null;
  private readonly events: CommentEvent[] = [];

  constructor(options: ScrubOptions = {}) {
    this.headerLimit = Math.max(0, options.headerLines ?? 0);
  }

  /**
   * Process the next line (with its terminator) and return what to write
   */
  push(line: string): string {
    if (this.headerCopied < this.headerLimit) {
      this.headerCopied++;
      return line;
    }

    // Body numbering starts after however many header lines the file really had
    this.scanner ??= createScanner(this.headerCopied + 1);
    this.bodyLines++;

    const { output, events } = this.scanner.feed(line);
    this.events.push(...events);
    return output;
  }

  /**
   * Scrub an async sequence of lines, yielding only non-empty output
   */
  async *scrubLines(lines: AsyncIterable<string>): AsyncGenerator<string> {
    for await (const line of lines) {
      const output = this.push(line);
      if (output.length > 0) {
        yield output;
      }
    }
  }

  report(): ScrubReport {
    const events = [...this.events];
    return {
      headerLines: this.headerCopied,
      bodyLines: this.bodyLines,
      events,
      stats: countEvents(events),
      finalMode: this.scanner?.mode ?? "normal",
      unterminatedBlockStart: this.scanner?.pendingBlockStart ?? null,
    };
  }
}

/**
 * Scrub a complete text held in memory
 */
export function scrubText(text: string, options: ScrubOptions = {}): ScrubTextResult {
  const scrubber = new Scrubber(options);
  let output = "";
  for (const line of splitLines(text)) {
    output += scrubber.push(line);
  }
  return { output, report: scrubber.report() };
}

export interface ScrubStreamOptions extends ScrubOptions {
  /** End the sink when the input is exhausted (false for stdout) */
  endSink?: boolean;
}

/**
 * Scrub a text stream into a writable sink, one line at a time.
 *
 * With a null sink the input is scanned and reported on but nothing is written.
 */
export async function scrubStream(
  source: AsyncIterable<string | Buffer>,
  sink: Writable | null,
  options: ScrubStreamOptions = {}
): Promise<ScrubReport> {
  const scrubber = new Scrubber(options);

  if (sink === null) {
    for await (const line of readLines(source)) {
      scrubber.push(line);
    }
  } else {
    await pipeline(scrubber.scrubLines(readLines(source)), sink, { end: options.endSink ?? true });
  }

  return scrubber.report();
}
