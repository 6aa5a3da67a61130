import type { ArtifactRef, ExtractableFormat, ExtractionResult } from "@mediasift/utils";

export interface ExtractInput {
  bytes: Buffer;
  artifact: ArtifactRef;
  filename: string | null;
}

export interface ExtractionContext {
  /** Aborted on cancellation or timeout; `reason` carries the job failure. */
  signal: AbortSignal;
  /** Persists bytes derived during extraction (frames, embedded images); returns their hash. */
  storeDerived(bytes: Uint8Array): Promise<string>;
}

export interface Extractor {
  readonly format: ExtractableFormat;
  readonly name: string;
  /** Bumped whenever output for the same bytes would change; part of the result cache key. */
  readonly version: string;
  extract(input: ExtractInput, ctx: ExtractionContext): Promise<ExtractionResult>;
}
