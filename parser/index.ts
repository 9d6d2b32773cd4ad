import { composeDesignDocument, designDocumentFileName, DesignDocumentInput } from "./designDocument";
import { DocxOptions, packDocx } from "./docxSerializer";
import { DocumentModel } from "./types";

export interface GeneratedDocument {
  model: DocumentModel;
  buffer: Buffer;
  fileName: string;
}

export async function generateDesignDocument(
  input: DesignDocumentInput,
  options: DocxOptions = {}
): Promise<GeneratedDocument> {
  const model = composeDesignDocument(input);
  const buffer = await packDocx(model, options);
  return { model, buffer, fileName: designDocumentFileName(input.userStoryName) };
}

export * from "./types";
export * from "./documentBuilder";
export * from "./designDocument";
export * from "./docxSerializer";
export * from "./docxExtractor";
export { formatInline, runsToText } from "./inlineFormatter";
