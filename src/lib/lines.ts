/**
 * Line splitting that keeps terminators.
 *
 * The scanner needs to see each line's `\n` to end line comments, and the
 * output must reproduce the input's line endings exactly.
 */

import { StringDecoder } from "string_decoder";

/**
 * Split text into lines, each keeping its trailing `\n` (and any `\r` before it).
 * The final line has no terminator when the text does not end with one.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf("\n", start);
    if (newline === -1) {
      lines.push(text.slice(start));
      break;
    }
    lines.push(text.slice(start, newline + 1));
    start = newline + 1;
  }
  return lines;
}

/**
 * Re-chunk a stream of text into lines, holding back only the unfinished tail.
 */
export async function* readLines(source: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  // Buffers may split a multi-byte character; the decoder holds the partial bytes back
  const decoder = new StringDecoder("utf8");
  let pending = "";
  for await (const chunk of source) {
    pending += typeof chunk === "string" ? chunk : decoder.write(chunk);
    let newline = pending.indexOf("\n");
    while (newline !== -1) {
      yield pending.slice(0, newline + 1);
      pending = pending.slice(newline + 1);
      newline = pending.indexOf("\n");
    }
  }
  pending += decoder.end();
  if (pending.length > 0) {
    yield pending;
  }
}
