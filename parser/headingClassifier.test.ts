import { describe, expect, it } from "vitest";
import { classifyHeading, nominalLevelOf } from "./headingClassifier";
import { TocRegistry } from "./tocRegistry";
import { HeadingBlock, ParseState } from "./types";

function classifyAll(lines: string[]): { headings: HeadingBlock[]; toc: TocRegistry; state: ParseState } {
  const state: ParseState = {};
  const toc = new TocRegistry();
  const headings = lines.map(line => classifyHeading(line, state, toc));
  return { headings, toc, state };
}

describe("nominalLevelOf", () => {
  it("counts leading markers only", () => {
    expect(nominalLevelOf("### Three")).toBe(3);
    expect(nominalLevelOf("## C# Tips")).toBe(2);
    expect(nominalLevelOf("no markers")).toBe(0);
  });
});

describe("classifyHeading", () => {
  it("keeps the title at level 1 and out of the TOC", () => {
    const { headings, toc } = classifyAll(["# Title"]);
    expect(headings).toEqual([{ type: "heading", displayLevel: 1, text: "Title" }]);
    expect(toc.size).toBe(0);
  });

  it("clamps deep headings to level 2 but records the nominal level", () => {
    const { headings, toc } = classifyAll(["#### Deep"]);
    expect(headings[0].displayLevel).toBe(2);
    expect(toc.entries()).toEqual([{ nominalLevel: 4, text: "Deep" }]);
  });

  it("removes every marker from the heading text", () => {
    const { headings } = classifyAll(["## C# Tips", "########"]);
    expect(headings[0].text).toBe("C Tips");
    expect(headings[1]).toEqual({ type: "heading", displayLevel: 2, text: "" });
  });

  it("leaves How It Works at the default level without a Solution heading", () => {
    const { headings } = classifyAll(["### How It Works"]);
    expect(headings[0].displayLevel).toBe(2);
  });

  it("nests How It Works under an earlier Solution heading", () => {
    const { headings, state, toc } = classifyAll(["## Proposed Solution", "#### How It Works"]);
    expect(state.currentSolutionHeading).toBe("Proposed Solution");
    expect(headings.map(h => h.displayLevel)).toEqual([2, 3]);
    expect(toc.entries()).toEqual([
      { nominalLevel: 2, text: "Proposed Solution" },
      { nominalLevel: 4, text: "How It Works" },
    ]);
  });

  it("applies the override anywhere later in the document", () => {
    const { headings } = classifyAll(["## Solution", "## Impacts", "# How It Works"]);
    expect(headings.map(h => h.displayLevel)).toEqual([2, 2, 3]);
  });

  it("keeps a heading naming both at its default level", () => {
    const { headings } = classifyAll(["## Solution", "## How It Works with the Solution"]);
    expect(headings[1].displayLevel).toBe(2);
  });

  it("always produces a display level between 1 and 3", () => {
    const { headings } = classifyAll(["#", "# A", "## Solution", "###### B", "############ How It Works"]);
    for (const heading of headings) {
      expect([1, 2, 3]).toContain(heading.displayLevel);
    }
  });
});
