import { buildDocument } from "./documentBuilder";
import { Block, DocumentModel } from "./types";

export interface DesignDocumentInput {
  userStoryName: string;
  userStoryDescription?: string;
  additionalContext?: string;
  /** Markdown produced by the code-change analysis. */
  analysis: string;
}

function section(title: string, body: string): Block[] {
  return [
    { type: "heading", displayLevel: 2, text: title },
    // Form text is kept verbatim, markers included
    { type: "paragraph", runs: body ? [{ text: body, bold: false }] : [] },
  ];
}

/**
 * Lays out the user story preamble ahead of the analysis. Only the analysis
 * headings contribute table-of-contents entries.
 */
export function composeDesignDocument(input: DesignDocumentInput): DocumentModel {
  const blocks: Block[] = [...section("User Story Name", input.userStoryName)];

  if (input.userStoryDescription) {
    blocks.push(...section("User Story Description", input.userStoryDescription));
  }
  if (input.additionalContext?.trim()) {
    blocks.push(...section("Additional Context & Instructions", input.additionalContext));
  }

  const analysis = buildDocument(input.analysis);
  blocks.push(...analysis.blocks);

  return { blocks, toc: analysis.toc };
}

export function designDocumentFileName(userStoryName: string): string {
  return `${(userStoryName || "code_analysis").replace(/ /g, "_")}.docx`;
}
