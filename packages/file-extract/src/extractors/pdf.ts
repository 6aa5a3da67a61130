import {
  ExtractionFailedError,
  type ExtractionResult,
  type MetadataValue,
  type OutlineEntry,
  type Segment,
  UnsupportedFormatError,
  errorMessage,
} from "@mediasift/utils";
import { PdfParseDecoder } from "../decoders/pdf-parse.js";
import { extractOutline, titleFromText } from "../lib/outline.js";
import { buildResult, normalizeText } from "../lib/result.js";
import type { ExtractInput, ExtractionContext, Extractor } from "../types.js";
import type { OcrEngine } from "./image.js";

export interface PdfImage {
  data: Uint8Array;
  width: number;
  height: number;
  format: string;
}

export interface PdfPage {
  text: string;
  images: PdfImage[];
}

export interface PdfInfo {
  title: string | null;
  author: string | null;
  producer: string | null;
}

export interface PdfHandle {
  pageCount: number;
  info: PdfInfo;
  /** 1-based. */
  readPage(pageNumber: number): Promise<PdfPage>;
  /** Rasterises a page for text recognition; decoders that cannot render leave it out. */
  renderPage?(pageNumber: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface PdfDecoder {
  open(bytes: Buffer): Promise<PdfHandle>;
}

export interface PdfExtractorOptions {
  decoder?: PdfDecoder;
  /** Store embedded images as derived artifacts. */
  images?: boolean;
  /** Recognises text on pages that carry none, such as scans. */
  ocr?: OcrEngine;
}

export class PdfExtractor implements Extractor {
  readonly format = "pdf";
  readonly name = "pdf";
  readonly version = "2";

  private decoder: PdfDecoder;
  private images: boolean;
  private ocr: OcrEngine | null;

  constructor(options: PdfExtractorOptions = {}) {
    this.decoder = options.decoder ?? new PdfParseDecoder();
    this.images = options.images ?? true;
    this.ocr = options.ocr ?? null;
  }

  async extract(input: ExtractInput, ctx: ExtractionContext): Promise<ExtractionResult> {
    let handle: PdfHandle;
    try {
      handle = await this.decoder.open(input.bytes);
    } catch (err) {
      throw new UnsupportedFormatError("The PDF could not be opened", errorMessage(err));
    }

    const metadata: Record<string, MetadataValue> = {
      pageCount: handle.pageCount,
      title: handle.info.title,
      author: handle.info.author,
      producer: handle.info.producer,
      ocrPages: 0,
    };
    const segments: Segment[] = [];
    const outline: OutlineEntry[] = [];
    const snapshot = () => ({ ...buildResult(this, input, metadata, segments), outline });
    const render = handle.renderPage?.bind(handle);
    let offset = 0;
    let ocrPages = 0;

    try {
      for (let page = 1; page <= handle.pageCount; page++) {
        ctx.signal.throwIfAborted();

        let content: PdfPage;
        try {
          content = await handle.readPage(page);
        } catch (err) {
          ctx.signal.throwIfAborted();
          throw new ExtractionFailedError(
            `Failed to decode page ${page} of ${handle.pageCount}`,
            errorMessage(err),
            segments.length > 0 ? snapshot() : undefined,
          );
        }

        let text = normalizeText(content.text);
        if (text.length === 0 && this.ocr && render) {
          text = await this.recognizePage(render, this.ocr, page, ctx, () =>
            segments.length > 0 ? snapshot() : undefined,
          );
          if (text.length > 0) metadata.ocrPages = ++ocrPages;
        }
        if (page === 1 && metadata.title === null) metadata.title = titleFromText(text);
        outline.push(...extractOutline(text, page));

        segments.push({ type: "text", page, offset, path: null, text });
        offset += text.length + 1;

        if (!this.images) continue;
        for (const image of content.images) {
          const artifact = await ctx.storeDerived(image.data);
          segments.push({
            type: "image",
            page,
            time: null,
            region: null,
            width: image.width,
            height: image.height,
            format: image.format,
            artifact,
          });
        }
      }
    } finally {
      await handle.close();
    }

    return snapshot();
  }

  private async recognizePage(
    render: (pageNumber: number) => Promise<Uint8Array>,
    ocr: OcrEngine,
    page: number,
    ctx: ExtractionContext,
    partial: () => ExtractionResult | undefined,
  ): Promise<string> {
    try {
      const image = await render(page);
      return normalizeText(await ocr.recognize(Buffer.from(image), ctx.signal));
    } catch (err) {
      ctx.signal.throwIfAborted();
      throw new ExtractionFailedError(`Text recognition failed on page ${page}`, errorMessage(err), partial());
    }
  }
}
