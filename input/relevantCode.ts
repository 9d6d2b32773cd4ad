const DECLARATION = /^(import .+|from .+ import .+|def \w+\(|class \w+:)/;
const CONTEXT_LINES = 5;
const CHANGED_LINES_SCANNED = 10;
const CONTEXT_CHARS = 200;
const MAX_ENTRIES = 5000;

export const CONTEXT_HEADER = "# Context for changes:";

/**
 * Reduces an original source file to its import/declaration lines (each with
 * a few lines of trailing context) plus the surroundings of any changed lines
 * that also appear verbatim in the original.
 */
export function extractRelevantCode(fullCode: string, changedCode: string): string {
  const relevant: string[] = [];

  let trailing = 0;
  for (const line of fullCode.split("\n")) {
    if (DECLARATION.test(line)) {
      relevant.push(line);
      trailing = CONTEXT_LINES;
    } else if (trailing > 0) {
      relevant.push(line);
      trailing--;
    }
  }

  for (const changedLine of changedCode.split("\n").slice(0, CHANGED_LINES_SCANNED)) {
    if (!changedLine.trim()) continue;
    const index = fullCode.indexOf(changedLine);
    if (index === -1) continue;

    const context = fullCode.slice(Math.max(0, index - CONTEXT_CHARS), index + CONTEXT_CHARS);
    relevant.push(`\n${CONTEXT_HEADER}\n${context}`);
  }

  return relevant.slice(0, MAX_ENTRIES).join("\n");
}
