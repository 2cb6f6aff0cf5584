import { describe, it, expect } from "vitest";

import { isWhitespaceOnly, trimWhitespace } from "@/lib/whitespace.js";

describe("isWhitespaceOnly", () => {
  it("accepts the empty string", () => {
    expect(isWhitespaceOnly("")).toBe(true);
  });

  it("accepts ASCII and Unicode spaces", () => {
    expect(isWhitespaceOnly(" \t\v\f\r\n")).toBe(true);
    expect(isWhitespaceOnly("\u0085\u00A0\u2000\u200A\u2028\u3000")).toBe(true);
  });

  it("rejects a byte-order mark", () => {
    expect(isWhitespaceOnly("\uFEFF")).toBe(false);
    expect(isWhitespaceOnly("  \uFEFF")).toBe(false);
  });

  it("rejects zero-width characters outside White_Space", () => {
    expect(isWhitespaceOnly("\u200B")).toBe(false);
  });
});

describe("trimWhitespace", () => {
  it("strips both ends", () => {
    expect(trimWhitespace("\u0085 // c \t")).toBe("// c");
  });

  it("keeps a byte-order mark", () => {
    expect(trimWhitespace(" \uFEFF// c ")).toBe("\uFEFF// c");
  });

  it("returns an empty string for blank input", () => {
    expect(trimWhitespace("\u3000 \n")).toBe("");
  });
});
