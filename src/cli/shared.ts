/**
 * Shared CLI utilities
 */

import type { Readable, Writable } from "stream";

/**
 * Streams a command talks to; tests substitute in-memory ones
 */
export interface CommandStreams {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

export function defaultStreams(): CommandStreams {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  };
}

export function writeLine(stream: Writable, text: string): void {
  stream.write(`${text}\n`);
}
