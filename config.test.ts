import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({ PORT: "8080", CHUNK_SIZE: "1000", DOCUMENT_FONT: "Georgia", DOCUMENT_FONT_SIZE: "11" });
    expect(config.port).toBe(8080);
    expect(config.chunking.chunkSize).toBe(1000);
    expect(config.document).toEqual({ fontName: "Georgia", fontSize: 11 });
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ MAX_UPLOAD_BYTES: "-5" })).toThrow(ConfigError);
  });

  it("rejects an overlap as large as the chunk", () => {
    expect(() => loadConfig({ CHUNK_SIZE: "200", CHUNK_OVERLAP: "200" })).toThrow(
      "CHUNK_OVERLAP (200) must be smaller than CHUNK_SIZE (200)"
    );
  });
});
