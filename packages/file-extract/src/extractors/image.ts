import {
  ExtractionFailedError,
  type ExtractionResult,
  type Segment,
  UnsupportedFormatError,
  errorMessage,
} from "@mediasift/utils";
import { ImageSizeProbe } from "../decoders/image-size.js";
import { buildResult, normalizeText } from "../lib/result.js";
import type { ExtractInput, ExtractionContext, Extractor } from "../types.js";

export interface ImageInfo {
  width: number | null;
  height: number | null;
  type: string | null;
  /** EXIF orientation, 1-8. */
  orientation: number | null;
}

export interface ImageProbe {
  probe(bytes: Buffer): Promise<ImageInfo>;
}

/** Optional text recognition; no engine ships by default. */
export interface OcrEngine {
  recognize(bytes: Buffer, signal: AbortSignal): Promise<string>;
}

export interface ImageExtractorOptions {
  probe?: ImageProbe;
  ocr?: OcrEngine;
}

export class ImageExtractor implements Extractor {
  readonly format = "image";
  readonly name = "image";
  readonly version = "1";

  private probe: ImageProbe;
  private ocr: OcrEngine | null;

  constructor(options: ImageExtractorOptions = {}) {
    this.probe = options.probe ?? new ImageSizeProbe();
    this.ocr = options.ocr ?? null;
  }

  async extract(input: ExtractInput, ctx: ExtractionContext): Promise<ExtractionResult> {
    let info: ImageInfo;
    try {
      info = await this.probe.probe(input.bytes);
    } catch (err) {
      throw new UnsupportedFormatError("The image could not be decoded", errorMessage(err));
    }
    ctx.signal.throwIfAborted();

    const segments: Segment[] = [
      {
        type: "image",
        page: null,
        time: null,
        region:
          info.width !== null && info.height !== null
            ? { x: 0, y: 0, width: info.width, height: info.height }
            : null,
        width: info.width,
        height: info.height,
        format: info.type,
        artifact: input.artifact.hash,
      },
    ];

    if (this.ocr) {
      let recognized: string;
      try {
        recognized = await this.ocr.recognize(input.bytes, ctx.signal);
      } catch (err) {
        ctx.signal.throwIfAborted();
        throw new ExtractionFailedError("Text recognition failed", errorMessage(err));
      }
      const text = normalizeText(recognized);
      if (text.length > 0) segments.push({ type: "text", page: null, offset: 0, path: null, text });
    }

    return buildResult(
      this,
      input,
      {
        width: info.width,
        height: info.height,
        imageType: info.type,
        orientation: info.orientation,
        ocr: this.ocr !== null,
      },
      segments,
    );
  }
}
