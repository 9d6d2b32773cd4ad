import { describe, expect, it } from "vitest";
import { buildDocument } from "../parser/documentBuilder";
import { formatOutline } from "./outline";

describe("formatOutline", () => {
  it("lists blocks then TOC entries", () => {
    const model = buildDocument("# Title\n## Solution\n- **step** one\n1. first\ntext\n### Details");

    expect(formatOutline(model)).toBe(
      [
        "  1. [H1] Title",
        "  2. [H2] Solution",
        "  3. [BULLET] step one",
        "  4. [NUMBER] first",
        "  5. [PARA] text",
        "  6. [H2] Details",
        "",
        "=== TABLE OF CONTENTS (2 entries) ===",
        "  Solution",
        "    Details",
      ].join("\n")
    );
  });
});
