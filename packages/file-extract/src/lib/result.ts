import type { ExtractionResult, MetadataValue, Segment } from "@mediasift/utils";
import type { ExtractInput, Extractor } from "../types.js";

export function buildResult(
  extractor: Extractor,
  input: ExtractInput,
  metadata: Record<string, MetadataValue>,
  segments: Segment[],
): ExtractionResult {
  return {
    format: extractor.format,
    extractor: { name: extractor.name, version: extractor.version },
    artifact: input.artifact.hash,
    metadata,
    segments,
  };
}

/** Unifies line endings, drops trailing blanks on each line and trims the block. */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .trim();
}

/** Width and height from a PNG IHDR chunk, or nulls for anything else. */
export function pngDimensions(bytes: Buffer): { width: number | null; height: number | null } {
  if (bytes.length < 24 || bytes.toString("ascii", 12, 16) !== "IHDR") {
    return { width: null, height: null };
  }
  return { width: bytes.readUInt32BE(16), height: bytes.readUInt32BE(20) };
}
