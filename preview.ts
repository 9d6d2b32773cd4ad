import * as fs from "fs";
import * as path from "path";
import { formatOutline } from "./cli/outline";
import { loadConfig } from "./config";
import { buildDocument, packDocx } from "./parser";

async function main() {
  const [inputPath, outputPath] = process.argv.slice(2);
  if (!inputPath) {
    console.error("Usage: preview <analysis.md> [out.docx]");
    process.exit(1);
  }

  const markdownPath = path.resolve(inputPath);
  if (!fs.existsSync(markdownPath)) {
    console.error(`File not found: ${markdownPath}`);
    process.exit(1);
  }

  const model = buildDocument(fs.readFileSync(markdownPath, "utf-8"));
  console.log(formatOutline(model));

  if (outputPath) {
    const { document } = loadConfig();
    const buffer = await packDocx(model, { includeToc: true, fontName: document.fontName, fontSize: document.fontSize });
    fs.writeFileSync(path.resolve(outputPath), buffer);
    console.log(`\nWrote ${buffer.length} bytes to ${outputPath}`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
