import { ConfigError } from "./errors";

export interface AppConfig {
  port: number;
  maxUploadBytes: number;
  chunking: ChunkingConfig;
  document: DocumentStyleConfig;
}

export interface ChunkingConfig {
  /** Texts longer than this are split before analysis. */
  threshold: number;
  chunkSize: number;
  chunkOverlap: number;
}

export interface DocumentStyleConfig {
  fontName: string;
  /** Point size of the Normal style. */
  fontSize: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3000,
  maxUploadBytes: 5 * 1024 * 1024, // 5MB
  chunking: {
    threshold: 3000,
    chunkSize: 2000,
    chunkOverlap: 200,
  },
  document: {
    fontName: "Calibri",
    fontSize: 12,
  },
};

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const chunking: ChunkingConfig = {
    threshold: readPositiveInt(env, "CHUNK_THRESHOLD", DEFAULT_CONFIG.chunking.threshold),
    chunkSize: readPositiveInt(env, "CHUNK_SIZE", DEFAULT_CONFIG.chunking.chunkSize),
    chunkOverlap: readPositiveInt(env, "CHUNK_OVERLAP", DEFAULT_CONFIG.chunking.chunkOverlap),
  };

  if (chunking.chunkOverlap >= chunking.chunkSize) {
    throw new ConfigError(
      `CHUNK_OVERLAP (${chunking.chunkOverlap}) must be smaller than CHUNK_SIZE (${chunking.chunkSize})`
    );
  }

  return {
    port: readPositiveInt(env, "PORT", DEFAULT_CONFIG.port),
    maxUploadBytes: readPositiveInt(env, "MAX_UPLOAD_BYTES", DEFAULT_CONFIG.maxUploadBytes),
    chunking,
    document: {
      fontName: env.DOCUMENT_FONT?.trim() || DEFAULT_CONFIG.document.fontName,
      fontSize: readPositiveInt(env, "DOCUMENT_FONT_SIZE", DEFAULT_CONFIG.document.fontSize),
    },
  };
}
