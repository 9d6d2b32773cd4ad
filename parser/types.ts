export interface Run {
  text: string;
  bold: boolean;
}

export type DisplayLevel = 1 | 2 | 3;

export type ListKind = "bullet" | "numbered";

export interface HeadingBlock {
  type: "heading";
  displayLevel: DisplayLevel;
  text: string;
}

export interface ParagraphBlock {
  type: "paragraph";
  runs: Run[];
}

export interface ListItemBlock {
  type: "listItem";
  kind: ListKind;
  runs: Run[];
}

export type Block = HeadingBlock | ParagraphBlock | ListItemBlock;

export interface TocEntry {
  nominalLevel: number;
  text: string;
}

export interface DocumentModel {
  blocks: readonly Block[];
  toc: readonly TocEntry[];
}

export type Segment =
  | { kind: "heading"; line: string }
  | { kind: "body"; lines: string[] };

/**
 * Sequential state for a single conversion. Owned by one buildDocument call.
 */
export interface ParseState {
  currentSolutionHeading?: string;
}

// WordprocessingML-level shapes, one step away from XML

export interface DocxRun {
  text: string;
  isBold?: boolean;
}

export interface DocxParagraph {
  type: "paragraph";
  runs: DocxRun[];
  styleName?: string;
  numbering?: { level: number; numId: number } | null;
}
