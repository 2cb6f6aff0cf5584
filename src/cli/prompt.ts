/**
 * Interactive yes/no confirmation
 */

import { createInterface } from "readline";

import type { Readable, Writable } from "stream";

export interface PromptStreams {
  input: Readable;
  output: Writable;
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * Ask a question answered with y/N. A closed input counts as "no".
 */
export async function askYesNo(question: string, streams: PromptStreams): Promise<boolean> {
  const rl = createInterface({ input: streams.input, output: streams.output, terminal: false });

  const answer = await new Promise<string | null>((resolve) => {
    rl.once("close", () => resolve(null));
    streams.output.write(`${question} [y/N]: `);
    rl.once("line", (line) => resolve(line));
  });
  rl.close();

  return answer !== null && isAffirmative(answer);
}
