import JSZip from "jszip";
import { XMLParser } from "fast-xml-parser";
import { DocxFormatError } from "../errors";
import { Block, DocxParagraph, DocxRun } from "./types";

// With preserveOrder every element is { [tag]: children[], ":@"?: attributes }
type OrderedNode = Record<string, unknown>;

function isNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function childrenOf(nodes: unknown[], tag: string): unknown[][] {
  const found: unknown[][] = [];
  for (const node of nodes) {
    if (isNode(node)) {
      const children = node[tag];
      if (Array.isArray(children)) {
        found.push(children);
      }
    }
  }
  return found;
}

function firstChildren(nodes: unknown[], tag: string): unknown[] | undefined {
  return childrenOf(nodes, tag)[0];
}

function attributeOf(nodes: unknown[], tag: string, attribute: string): string | undefined {
  for (const node of nodes) {
    if (isNode(node) && tag in node) {
      const attrs = node[":@"];
      if (isNode(attrs)) {
        const value = attrs[`@_${attribute}`];
        return value === undefined ? undefined : String(value);
      }
    }
  }
  return undefined;
}

function textOf(nodes: unknown[]): string {
  let text = "";
  for (const node of nodes) {
    if (isNode(node) && "#text" in node) {
      text += String(node["#text"]);
    }
  }
  return text;
}

function extractRun(runNodes: unknown[]): DocxRun {
  const props = firstChildren(runNodes, "w:rPr");
  const isBold = props ? childrenOf(props, "w:b").length > 0 : false;

  let text = "";
  for (const node of runNodes) {
    if (!isNode(node)) continue;
    const tNode = node["w:t"];
    if (Array.isArray(tNode)) {
      text += textOf(tNode);
    } else if ("w:br" in node) {
      text += "\n";
    }
  }
  return { text, isBold };
}

function extractParagraph(pNodes: unknown[]): DocxParagraph {
  const props = firstChildren(pNodes, "w:pPr");
  const styleName = props ? attributeOf(props, "w:pStyle", "w:val") : undefined;
  const runs = childrenOf(pNodes, "w:r").map(extractRun);
  return { type: "paragraph", styleName, runs };
}

function paragraphToBlock(para: DocxParagraph): Block | null {
  const style = para.styleName ?? "";
  if (style.startsWith("TOC")) {
    return null;
  }

  const runs = para.runs
    .filter(run => run.text !== "")
    .map(run => ({ text: run.text, bold: run.isBold === true }));

  const heading = /^Heading([1-3])$/.exec(style);
  if (heading) {
    const displayLevel = heading[1] === "1" ? 1 : heading[1] === "2" ? 2 : 3;
    return { type: "heading", displayLevel, text: runs.map(r => r.text).join("") };
  }
  if (style === "ListBullet") {
    return { type: "listItem", kind: "bullet", runs };
  }
  if (style === "ListNumber") {
    return { type: "listItem", kind: "numbered", runs };
  }
  return { type: "paragraph", runs };
}

export async function extractDocxParagraphs(buffer: Buffer | Uint8Array): Promise<DocxParagraph[]> {
  const zip = await JSZip.loadAsync(buffer);
  const documentPart = zip.file("word/document.xml");
  if (!documentPart) {
    throw new DocxFormatError("Package has no word/document.xml part");
  }

  const xml = await documentPart.async("string");
  const parser = new XMLParser({
    ignoreAttributes: false,
    preserveOrder: true,
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: false,
  });
  const doc: unknown = parser.parse(xml);
  if (!Array.isArray(doc)) {
    throw new DocxFormatError("Could not parse document XML");
  }

  const document = firstChildren(doc, "w:document");
  if (!document) {
    throw new DocxFormatError("Could not find document element");
  }
  const body = firstChildren(document, "w:body");
  if (!body) {
    throw new DocxFormatError("Could not find document body");
  }

  // Tables and section properties are not part of the generated documents
  return childrenOf(body, "w:p").map(extractParagraph);
}

/**
 * Reads a generated .docx back into blocks. Table-of-contents paragraphs are
 * skipped and empty runs dropped.
 */
export async function readDocxBlocks(buffer: Buffer | Uint8Array): Promise<Block[]> {
  const paragraphs = await extractDocxParagraphs(buffer);
  const blocks: Block[] = [];
  for (const para of paragraphs) {
    const block = paragraphToBlock(para);
    if (block) blocks.push(block);
  }
  return blocks;
}
