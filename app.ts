import express, { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppConfig } from "./config";
import { UnsupportedFileTypeError, UploadDecodeError } from "./errors";
import { buildAnalysisPrompt } from "./input/analysisPrompt";
import { decodeUpload, isSupportedSourceFile, prepareSourceText } from "./input/fileProcessing";
import { extractRelevantCode } from "./input/relevantCode";
import { buildDocument, generateDesignDocument } from "./parser";

export const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

function field(body: unknown, name: string): string | undefined {
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, name);
  return typeof value === "string" ? value : undefined;
}

function flag(body: unknown, name: string): boolean {
  if (typeof body !== "object" || body === null) return false;
  const value: unknown = Reflect.get(body, name);
  return value === true || value === "true";
}

function statusFor(error: unknown): number {
  if (
    error instanceof multer.MulterError ||
    error instanceof UnsupportedFileTypeError ||
    error instanceof UploadDecodeError ||
    error instanceof SyntaxError
  ) {
    return 400;
  }
  return 500;
}

export function createApp(config: AppConfig): express.Express {
  const app = express();

  // Uploads never touch the disk
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes },
    fileFilter: (req, file, cb) => {
      if (isSupportedSourceFile(file.originalname)) {
        cb(null, true);
      } else {
        cb(new UnsupportedFileTypeError(file.originalname));
      }
    },
  });

  app.use(express.json({ limit: "2mb" }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  app.get("/api/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Builds the task text for the code analyst from the original file and the changed code
  app.post("/api/analysis-prompt", upload.single("originalFile"), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const original = req.file ? decodeUpload(req.file.buffer) : "";
      const modifiedCode = field(req.body, "modifiedCode") ?? "";

      const prompt = buildAnalysisPrompt({
        originalCode: original ? extractRelevantCode(original, modifiedCode) : "",
        modifiedCode,
        additionalContext: field(req.body, "additionalPrompt"),
      });

      res.json({
        prompt,
        sourceChunks: original ? await prepareSourceText(original, config.chunking) : [],
      });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/preview", (req: Request, res: Response) => {
    const analysis = field(req.body, "analysis");
    if (analysis === undefined) {
      return res.status(400).json({ error: "No analysis provided" });
    }
    res.json(buildDocument(analysis));
  });

  app.post("/api/design-document", upload.none(), async (req: Request, res: Response) => {
    const analysis = field(req.body, "analysis");
    if (!analysis?.trim()) {
      return res.status(400).json({ error: "No analysis provided" });
    }

    try {
      const { model, buffer, fileName } = await generateDesignDocument(
        {
          userStoryName: field(req.body, "userStoryName") ?? "",
          userStoryDescription: field(req.body, "userStoryDescription"),
          additionalContext: field(req.body, "additionalPrompt"),
          analysis,
        },
        {
          includeToc: flag(req.body, "includeToc"),
          fontName: config.document.fontName,
          fontSize: config.document.fontSize,
        }
      );

      console.log(`[server] Generated ${fileName}: ${model.blocks.length} blocks, ${model.toc.length} TOC entries`);
      res.attachment(fileName);
      res.type(DOCX_MIME);
      res.send(buffer);
    } catch (error) {
      console.error("[server] Error generating design document:", error);
      res.status(500).json({ error: error instanceof Error ? error.message : "Failed to generate document" });
    }
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    const status = statusFor(error);
    const message = error instanceof Error ? error.message : String(error);
    if (status >= 500) {
      console.error(`[server] ${req.method} ${req.path} failed:`, error);
    } else {
      console.warn(`[server] ${req.method} ${req.path} rejected: ${message}`);
    }
    res.status(status).json({ error: message });
  });

  return app;
}
