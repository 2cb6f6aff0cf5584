import { PassThrough } from "stream";

import { describe, it, expect } from "vitest";

import { askYesNo, isAffirmative } from "@/cli/prompt.js";

import { MemoryWritable } from "../helpers/streams.js";

function answering(text: string): PassThrough {
  const input = new PassThrough();
  input.end(text);
  return input;
}

describe("isAffirmative", () => {
  it("accepts y and yes in any case", () => {
    expect(isAffirmative("y")).toBe(true);
    expect(isAffirmative("YES")).toBe(true);
    expect(isAffirmative("  Yes \r")).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isAffirmative("")).toBe(false);
    expect(isAffirmative("n")).toBe(false);
    expect(isAffirmative("yep")).toBe(false);
  });
});

describe("askYesNo", () => {
  it("writes the question with its default", async () => {
    const output = new MemoryWritable();

    await askYesNo("Keep header?", { input: answering("n\n"), output });

    expect(output.text).toBe("Keep header? [y/N]: ");
  });

  it("returns true for a yes answer", async () => {
    const output = new MemoryWritable();

    expect(await askYesNo("Keep header?", { input: answering("y\n"), output })).toBe(true);
  });

  it("reads only the first line", async () => {
    const output = new MemoryWritable();

    expect(await askYesNo("Keep header?", { input: answering("no\nyes\n"), output })).toBe(false);
  });

  it("treats closed input as no", async () => {
    const output = new MemoryWritable();

    expect(await askYesNo("Keep header?", { input: answering(""), output })).toBe(false);
  });
});
