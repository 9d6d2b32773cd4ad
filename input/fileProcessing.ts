import * as path from "path";
import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import { ChunkingConfig } from "../config";
import { UploadDecodeError } from "../errors";

export const SUPPORTED_SOURCE_EXTENSIONS: ReadonlySet<string> = new Set(["py", "txt", "js", "java", "c", "cpp", "go"]);

export function isSupportedSourceFile(fileName: string): boolean {
  const ext = path.extname(fileName).slice(1).toLowerCase();
  return SUPPORTED_SOURCE_EXTENSIONS.has(ext);
}

export function decodeUpload(buffer: Buffer | Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch (error) {
    throw new UploadDecodeError("Uploaded file is not valid UTF-8 text", { cause: error });
  }
}

type SplitOptions = Pick<ChunkingConfig, "chunkSize" | "chunkOverlap">;

/**
 * Splits text on paragraph, line, word and finally character boundaries so
 * that every chunk stays within `chunkSize`, with `chunkOverlap` characters
 * carried between neighbouring chunks.
 */
export async function chunkText(text: string, options: SplitOptions): Promise<string[]> {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  });
  return splitter.splitText(text);
}

export async function prepareSourceText(text: string, options: ChunkingConfig): Promise<string[]> {
  if (text.length > options.threshold) {
    return chunkText(text, options);
  }
  return [text];
}
