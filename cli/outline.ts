import { runsToText } from "../parser/inlineFormatter";
import { Block, DocumentModel } from "../parser/types";

function describeBlock(block: Block): string {
  switch (block.type) {
    case "heading":
      return `[H${block.displayLevel}] ${block.text}`;
    case "listItem":
      return `[${block.kind === "bullet" ? "BULLET" : "NUMBER"}] ${runsToText(block.runs)}`;
    case "paragraph":
      return `[PARA] ${runsToText(block.runs)}`;
  }
}

/**
 * One numbered line per block, then the TOC entries indented by level.
 */
export function formatOutline(model: DocumentModel): string {
  const lines = model.blocks.map((block, idx) => `${String(idx + 1).padStart(3, " ")}. ${describeBlock(block)}`);

  lines.push("", `=== TABLE OF CONTENTS (${model.toc.length} entries) ===`);
  for (const entry of model.toc) {
    lines.push(`${"  ".repeat(entry.nominalLevel - 1)}${entry.text}`);
  }
  return lines.join("\n");
}
