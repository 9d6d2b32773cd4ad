import { describe, expect, it } from "vitest";
import { isHeadingLine, segmentText } from "./segmenter";

describe("isHeadingLine", () => {
  it("requires a leading marker and at least one more character", () => {
    expect(isHeadingLine("# A")).toBe(true);
    expect(isHeadingLine("##")).toBe(true);
    expect(isHeadingLine("#")).toBe(false);
    expect(isHeadingLine("  # indented")).toBe(false);
    expect(isHeadingLine("text # later")).toBe(false);
  });
});

describe("segmentText", () => {
  it("separates headings from the body between them", () => {
    expect(segmentText("# A\nbody1\nbody2\n## B")).toEqual([
      { kind: "heading", line: "# A" },
      { kind: "body", lines: ["body1", "body2"] },
      { kind: "heading", line: "## B" },
    ]);
  });

  it("drops whitespace-only bodies", () => {
    expect(segmentText("# A\n   \n\n## B\n")).toEqual([
      { kind: "heading", line: "# A" },
      { kind: "heading", line: "## B" },
    ]);
  });

  it("treats a lone marker as body text", () => {
    expect(segmentText("#\ntext")).toEqual([{ kind: "body", lines: ["#", "text"] }]);
  });

  it("normalizes Windows line endings", () => {
    expect(segmentText("# A\r\ntext\r\n")).toEqual([
      { kind: "heading", line: "# A" },
      { kind: "body", lines: ["text", ""] },
    ]);
  });

  it("returns nothing for empty input", () => {
    expect(segmentText("")).toEqual([]);
  });
});
