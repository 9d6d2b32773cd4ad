import JSZip from "jszip";
import { DocumentSerializationError } from "../errors";
import { Block, DocumentModel, DocxParagraph, DocxRun, TocEntry } from "./types";

export const BULLET_NUM_ID = 1;
export const NUMBERED_NUM_ID = 2;
export const TOC_TITLE = "Table of Contents";
const MAX_TOC_STYLE_LEVEL = 6;

export interface DocxOptions {
  /** Render the collected TOC entries ahead of the body. */
  includeToc?: boolean;
  fontName?: string;
  /** Point size of the Normal style. */
  fontSize?: number;
}

// Control characters XML 1.0 has no representation for, plus the two noncharacters
const XML_FORBIDDEN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;

/**
 * Escapes XML special characters. Text that cannot appear in XML at all is
 * rejected rather than written into a package Word cannot open.
 */
function escapeXml(text: string): string {
  const forbidden = XML_FORBIDDEN.exec(text);
  if (forbidden) {
    const codePoint = forbidden[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, "0");
    throw new DocumentSerializationError(`Text contains a character that XML does not allow (U+${codePoint})`);
  }
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function blockToParagraph(block: Block): DocxParagraph {
  switch (block.type) {
    case "heading":
      return {
        type: "paragraph",
        styleName: `Heading${block.displayLevel}`,
        runs: block.text ? [{ text: block.text }] : [],
      };
    case "listItem":
      return {
        type: "paragraph",
        styleName: block.kind === "bullet" ? "ListBullet" : "ListNumber",
        numbering: { level: 0, numId: block.kind === "bullet" ? BULLET_NUM_ID : NUMBERED_NUM_ID },
        runs: block.runs.map(run => ({ text: run.text, isBold: run.bold })),
      };
    case "paragraph":
      return {
        type: "paragraph",
        runs: block.runs.map(run => ({ text: run.text, isBold: run.bold })),
      };
  }
}

export function tocStyleName(nominalLevel: number): string {
  return `TOC${Math.min(Math.max(nominalLevel, 2), MAX_TOC_STYLE_LEVEL)}`;
}

function tocToParagraphs(toc: readonly TocEntry[]): DocxParagraph[] {
  return [
    { type: "paragraph", styleName: "TOCHeading", runs: [{ text: TOC_TITLE }] },
    ...toc.map((entry): DocxParagraph => ({
      type: "paragraph",
      styleName: tocStyleName(entry.nominalLevel),
      runs: [{ text: entry.text }],
    })),
  ];
}

export function toDocxParagraphs(model: DocumentModel, options: DocxOptions = {}): DocxParagraph[] {
  const body = model.blocks.map(blockToParagraph);
  if (options.includeToc && model.toc.length > 0) {
    return [...tocToParagraphs(model.toc), ...body];
  }
  return body;
}

/**
 * Serializes paragraphs to the word/document.xml part.
 * Builds XML manually to keep run order and whitespace exact.
 */
export function serializeDocxParagraphs(paragraphs: DocxParagraph[]): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">\n';
  xml += '  <w:body>\n';

  for (const para of paragraphs) {
    xml += serializeParagraph(para, 4);
  }

  xml += '  </w:body>\n';
  xml += '</w:document>';
  return xml;
}

function serializeRunText(run: DocxRun, indentStr: string): string {
  if (run.text === "\n") {
    return `${indentStr}    <w:br/>\n`;
  }

  let xml = "";
  const parts = run.text.split("\n");
  for (let i = 0; i < parts.length; i++) {
    if (parts[i]) {
      xml += `${indentStr}    <w:t xml:space="preserve">${escapeXml(parts[i])}</w:t>\n`;
    }
    if (i < parts.length - 1) {
      xml += `${indentStr}    <w:br/>\n`;
    }
  }
  return xml;
}

function serializeParagraph(para: DocxParagraph, indent: number): string {
  const indentStr = " ".repeat(indent);
  let xml = `${indentStr}<w:p>\n`;

  if (para.styleName || para.numbering) {
    xml += `${indentStr}  <w:pPr>\n`;
    if (para.styleName) {
      xml += `${indentStr}    <w:pStyle w:val="${escapeXml(para.styleName)}"/>\n`;
    }
    if (para.numbering) {
      xml += `${indentStr}    <w:numPr>\n`;
      xml += `${indentStr}      <w:ilvl w:val="${para.numbering.level}"/>\n`;
      xml += `${indentStr}      <w:numId w:val="${para.numbering.numId}"/>\n`;
      xml += `${indentStr}    </w:numPr>\n`;
    }
    xml += `${indentStr}  </w:pPr>\n`;
  }

  for (const run of para.runs) {
    xml += `${indentStr}  <w:r>\n`;
    if (run.isBold) {
      xml += `${indentStr}    <w:rPr>\n`;
      xml += `${indentStr}      <w:b/>\n`;
      xml += `${indentStr}    </w:rPr>\n`;
    }
    xml += serializeRunText(run, indentStr);
    xml += `${indentStr}  </w:r>\n`;
  }

  xml += `${indentStr}</w:p>\n`;
  return xml;
}

const W_NS = 'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"';

const CONTENT_TYPES_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
  <Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>
  <Override PartName="/word/numbering.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.numbering+xml"/>
</Types>`;

const PACKAGE_RELS_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

const DOCUMENT_RELS_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles" Target="styles.xml"/>
  <Relationship Id="rId2" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/numbering" Target="numbering.xml"/>
</Relationships>`;

const NUMBERING_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:numbering ${W_NS}>
  <w:abstractNum w:abstractNumId="0">
    <w:lvl w:ilvl="0">
      <w:start w:val="1"/>
      <w:numFmt w:val="bullet"/>
      <w:lvlText w:val="•"/>
      <w:lvlJc w:val="left"/>
      <w:pPr><w:ind w:left="720" w:hanging="360"/></w:pPr>
    </w:lvl>
  </w:abstractNum>
  <w:abstractNum w:abstractNumId="1">
    <w:lvl w:ilvl="0">
      <w:start w:val="1"/>
      <w:numFmt w:val="decimal"/>
      <w:lvlText w:val="%1."/>
      <w:lvlJc w:val="left"/>
      <w:pPr><w:ind w:left="720" w:hanging="360"/></w:pPr>
    </w:lvl>
  </w:abstractNum>
  <w:num w:numId="${BULLET_NUM_ID}"><w:abstractNumId w:val="0"/></w:num>
  <w:num w:numId="${NUMBERED_NUM_ID}"><w:abstractNumId w:val="1"/></w:num>
</w:numbering>`;

function paragraphStyle(id: string, name: string, body: string): string {
  return `  <w:style w:type="paragraph" w:styleId="${id}">
    <w:name w:val="${name}"/>
    <w:basedOn w:val="Normal"/>
    <w:next w:val="Normal"/>
${body}
  </w:style>\n`;
}

function headingStyle(level: number, halfPoints: number): string {
  return paragraphStyle(
    `Heading${level}`,
    `heading ${level}`,
    `    <w:pPr><w:keepNext/><w:spacing w:before="240" w:after="80"/><w:outlineLvl w:val="${level - 1}"/></w:pPr>
    <w:rPr><w:b/><w:sz w:val="${halfPoints}"/></w:rPr>`
  );
}

export function buildStylesXml(fontName: string, fontSize: number): string {
  const font = escapeXml(fontName);
  const halfPoints = Math.round(fontSize * 2);

  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += `<w:styles ${W_NS}>\n`;
  xml += `  <w:docDefaults>
    <w:rPrDefault><w:rPr><w:rFonts w:ascii="${font}" w:hAnsi="${font}" w:cs="${font}"/><w:sz w:val="${halfPoints}"/></w:rPr></w:rPrDefault>
  </w:docDefaults>\n`;
  xml += `  <w:style w:type="paragraph" w:default="1" w:styleId="Normal">
    <w:name w:val="Normal"/>
    <w:rPr><w:rFonts w:ascii="${font}" w:hAnsi="${font}" w:cs="${font}"/><w:sz w:val="${halfPoints}"/></w:rPr>
  </w:style>\n`;
  xml += headingStyle(1, 32);
  xml += headingStyle(2, 26);
  xml += headingStyle(3, 24);
  xml += paragraphStyle("ListBullet", "List Bullet", `    <w:pPr><w:numPr><w:numId w:val="${BULLET_NUM_ID}"/></w:numPr></w:pPr>`);
  xml += paragraphStyle("ListNumber", "List Number", `    <w:pPr><w:numPr><w:numId w:val="${NUMBERED_NUM_ID}"/></w:numPr></w:pPr>`);
  xml += paragraphStyle("TOCHeading", "TOC Heading", `    <w:rPr><w:b/><w:sz w:val="28"/></w:rPr>`);
  for (let level = 2; level <= MAX_TOC_STYLE_LEVEL; level++) {
    xml += paragraphStyle(
      tocStyleName(level),
      `toc ${level}`,
      `    <w:pPr><w:ind w:left="${(level - 2) * 240}"/></w:pPr>`
    );
  }
  xml += "</w:styles>";
  return xml;
}

/**
 * Packs a document model into .docx bytes. The model is only read, so a
 * failed call can be retried with the same model.
 */
export async function packDocx(model: DocumentModel, options: DocxOptions = {}): Promise<Buffer> {
  const fontName = options.fontName ?? "Calibri";
  const fontSize = options.fontSize ?? 12;

  try {
    const zip = new JSZip();
    zip.file("[Content_Types].xml", CONTENT_TYPES_XML);
    zip.file("_rels/.rels", PACKAGE_RELS_XML);
    zip.file("word/_rels/document.xml.rels", DOCUMENT_RELS_XML);
    zip.file("word/document.xml", serializeDocxParagraphs(toDocxParagraphs(model, options)));
    zip.file("word/styles.xml", buildStylesXml(fontName, fontSize));
    zip.file("word/numbering.xml", NUMBERING_XML);

    const buffer = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
    console.log(`[docxSerializer] Packed ${model.blocks.length} blocks into ${buffer.length} bytes`);
    return buffer;
  } catch (error) {
    if (error instanceof DocumentSerializationError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new DocumentSerializationError(`Failed to build .docx package: ${reason}`, { cause: error });
  }
}
