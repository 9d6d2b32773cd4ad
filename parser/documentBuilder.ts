import { classifyHeading } from "./headingClassifier";
import { formatInline } from "./inlineFormatter";
import { classifyLine } from "./listClassifier";
import { segmentText } from "./segmenter";
import { TocRegistry } from "./tocRegistry";
import { Block, DocumentModel, ParseState } from "./types";

function bodyLineToBlock(line: string): Block {
  const classified = classifyLine(line);
  const runs = formatInline(classified.content);

  if (classified.kind === "paragraph") {
    return { type: "paragraph", runs };
  }
  return { type: "listItem", kind: classified.kind, runs };
}

/**
 * Converts analysis markdown into an ordered block sequence plus TOC entries.
 * Each call owns its own parse state, so calls never affect each other.
 */
export function buildDocument(text: string): DocumentModel {
  const state: ParseState = {};
  const toc = new TocRegistry();
  const blocks: Block[] = [];

  for (const segment of segmentText(text)) {
    if (segment.kind === "heading") {
      blocks.push(classifyHeading(segment.line, state, toc));
      continue;
    }

    for (const line of segment.lines) {
      if (!line.trim()) continue;
      blocks.push(bodyLineToBlock(line));
    }
  }

  return { blocks, toc: toc.entries() };
}
