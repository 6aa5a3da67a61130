import { z } from "zod";
import { EXTRACTABLE_FORMATS, type ExtractableFormat } from "../constants.js";

export interface TextSegment {
  type: "text";
  /** 1-based page for paged documents. */
  page: number | null;
  /** Character offset of this block within the flattened document text. */
  offset: number;
  /** Element path for structured sources, e.g. `catalog/book/title`. */
  path: string | null;
  text: string;
}

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ImageSegment {
  type: "image";
  page: number | null;
  /** Seconds from the start, for frames sampled out of a video. */
  time: number | null;
  region: Region | null;
  width: number | null;
  height: number | null;
  format: string | null;
  /** Content hash of the stored image bytes. */
  artifact: string | null;
}

export interface AudioSegment {
  type: "audio";
  start: number;
  end: number;
  /** [rms, peak, zeroCrossingRate] */
  features: [number, number, number];
}

export type Segment = TextSegment | ImageSegment | AudioSegment;

export type MetadataValue = string | number | boolean | null;

export type HeadingLevel = "H1" | "H2" | "H3";

export interface OutlineEntry {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface ExtractionResult {
  format: ExtractableFormat;
  extractor: { name: string; version: string };
  artifact: string;
  metadata: Record<string, MetadataValue>;
  segments: Segment[];
  /** Document headings in reading order; only paged documents have one. */
  outline?: OutlineEntry[];
}

const regionSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

const segmentSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("text"),
    page: z.number().nullable(),
    offset: z.number(),
    path: z.string().nullable(),
    text: z.string(),
  }),
  z.object({
    type: z.literal("image"),
    page: z.number().nullable(),
    time: z.number().nullable(),
    region: regionSchema.nullable(),
    width: z.number().nullable(),
    height: z.number().nullable(),
    format: z.string().nullable(),
    artifact: z.string().nullable(),
  }),
  z.object({
    type: z.literal("audio"),
    start: z.number(),
    end: z.number(),
    features: z.tuple([z.number(), z.number(), z.number()]),
  }),
]);

/** Validates results read back from storage. */
export const extractionResultSchema: z.ZodType<ExtractionResult> = z.object({
  format: z.enum(EXTRACTABLE_FORMATS),
  extractor: z.object({ name: z.string(), version: z.string() }),
  artifact: z.string(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
  segments: z.array(segmentSchema),
  outline: z
    .array(z.object({ level: z.enum(["H1", "H2", "H3"]), text: z.string(), page: z.number() }))
    .optional(),
});
