import { describe, expect, it } from "vitest";
import { CONTEXT_HEADER, extractRelevantCode } from "./relevantCode";

describe("extractRelevantCode", () => {
  it("keeps declarations with a few lines of context", () => {
    const original = [
      "import os",
      "a = 1",
      "b = 2",
      "c = 3",
      "d = 4",
      "e = 5",
      "f = 6",
      "def run():",
      "    return a",
    ].join("\n");

    expect(extractRelevantCode(original, "")).toBe(
      "import os\na = 1\nb = 2\nc = 3\nd = 4\ne = 5\ndef run():\n    return a"
    );
  });

  it("adds the surroundings of changed lines found in the original", () => {
    const original = `${"x".repeat(300)}TARGET${"y".repeat(300)}`;

    expect(extractRelevantCode(original, "TARGET\nmissing line")).toBe(
      `\n${CONTEXT_HEADER}\n${"x".repeat(200)}TARGET${"y".repeat(194)}`
    );
  });

  it("only looks at the first ten changed lines", () => {
    const changed = [...Array(10).fill("nope"), "TARGET"].join("\n");
    expect(extractRelevantCode("...TARGET...", changed)).toBe("");
  });
});
