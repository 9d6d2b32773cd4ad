import { TocRegistry } from "./tocRegistry";
import { DisplayLevel, HeadingBlock, ParseState } from "./types";

const SOLUTION_MARKER = "Solution";
const HOW_IT_WORKS_MARKER = "How It Works";

export function nominalLevelOf(line: string): number {
  const match = /^#*/.exec(line);
  return match ? match[0].length : 0;
}

export function clampDisplayLevel(nominalLevel: number): 1 | 2 {
  return nominalLevel <= 1 ? 1 : 2;
}

/**
 * Classifies one heading line. `state` is updated in place: once a heading
 * mentioning "Solution" has been seen, every later "How It Works" heading in
 * the document is shown at level 3.
 */
export function classifyHeading(line: string, state: ParseState, toc: TocRegistry): HeadingBlock {
  const nominalLevel = nominalLevelOf(line);
  const text = line.replace(/#/g, "").trim();

  let displayLevel: DisplayLevel = clampDisplayLevel(nominalLevel);
  if (text.includes(SOLUTION_MARKER)) {
    state.currentSolutionHeading = text;
  } else if (text.includes(HOW_IT_WORKS_MARKER) && state.currentSolutionHeading !== undefined) {
    displayLevel = 3;
  }

  toc.add(nominalLevel, text);

  return { type: "heading", displayLevel, text };
}
