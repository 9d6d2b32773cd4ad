/**
 * Raised when a document model cannot be packed into a .docx buffer.
 * The model itself is never modified, so the caller may retry.
 */
export class DocumentSerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentSerializationError";
  }
}

/** A .docx package is missing a part or its XML has an unexpected shape. */
export class DocxFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocxFormatError";
  }
}

export class UploadDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UploadDecodeError";
  }
}

export class UnsupportedFileTypeError extends Error {
  constructor(public readonly fileName: string) {
    super(`Unsupported file type: ${fileName}`);
    this.name = "UnsupportedFileTypeError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
