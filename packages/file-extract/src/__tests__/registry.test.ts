import { ConflictError, type ExtractionResult, UnsupportedFormatError } from "@mediasift/utils";
import { describe, expect, it } from "vitest";
import { ExtractorRegistry, createDefaultRegistry } from "../registry.js";
import type { Extractor } from "../types.js";

function stubExtractor(format: Extractor["format"], name: string = format): Extractor {
  return {
    format,
    name,
    version: "1",
    async extract(): Promise<ExtractionResult> {
      throw new Error("not used");
    },
  };
}

describe("ExtractorRegistry", () => {
  it("looks extractors up by format", () => {
    const registry = new ExtractorRegistry();
    const xml = stubExtractor("xml");
    registry.register(xml);

    expect(registry.get("xml")).toBe(xml);
    expect(registry.has("xml")).toBe(true);
    expect(registry.has("pdf")).toBe(false);
  });

  it("refuses a second extractor for the same format", () => {
    const registry = new ExtractorRegistry();
    registry.register(stubExtractor("pdf", "pdf-a"));
    expect(() => registry.register(stubExtractor("pdf", "pdf-b"))).toThrow(ConflictError);
    expect(registry.get("pdf").name).toBe("pdf-a");
  });

  it("does not fall back to another extractor", () => {
    const registry = new ExtractorRegistry();
    registry.register(stubExtractor("image"));

    expect(() => registry.get("video")).toThrow(UnsupportedFormatError);
    expect(() => registry.get("unknown")).toThrow('No extractor available for format "unknown"');
  });

  it("registers one extractor per extractable format by default", () => {
    const registry = createDefaultRegistry();
    expect(registry.formats()).toEqual(["pdf", "image", "audio", "video", "xml"]);
    expect(registry.get("audio").version).toBe("1");
  });
});
