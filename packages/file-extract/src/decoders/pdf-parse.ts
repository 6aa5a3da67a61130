import { z } from "zod";
import type { PdfDecoder, PdfHandle, PdfInfo, PdfPage } from "../extractors/pdf.js";

const infoSchema = z.object({
  total: z.number().int().nonnegative(),
  info: z.record(z.unknown()).nullish(),
});

const textSchema = z.object({
  pages: z.array(z.object({ num: z.number(), text: z.string() })),
});

const imageSchema = z.object({
  pages: z.array(
    z.object({
      images: z.array(
        z.object({
          data: z.instanceof(Uint8Array),
          width: z.number(),
          height: z.number(),
        }),
      ),
    }),
  ),
});

const screenshotSchema = z.object({
  pages: z.array(z.object({ data: z.instanceof(Uint8Array) })),
});

function stringField(info: Record<string, unknown> | null | undefined, key: string): string | null {
  const value = info?.[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

/**
 * pdf-parse wraps pdf.js; pages are read one at a time so the extractor can
 * stop between pages and keep what decoded before a broken page.
 */
export class PdfParseDecoder implements PdfDecoder {
  async open(bytes: Buffer): Promise<PdfHandle> {
    // pulls in pdf.js
    const { PDFParse } = await import("pdf-parse");
    const parser = new PDFParse({ data: new Uint8Array(bytes) });

    let total: number;
    let info: PdfInfo;
    try {
      const parsed = infoSchema.parse(await parser.getInfo());
      total = parsed.total;
      info = {
        title: stringField(parsed.info, "Title"),
        author: stringField(parsed.info, "Author"),
        producer: stringField(parsed.info, "Producer"),
      };
    } catch (err) {
      await parser.destroy();
      throw err;
    }

    return {
      pageCount: total,
      info,
      async readPage(pageNumber: number): Promise<PdfPage> {
        const text = textSchema.parse(await parser.getText({ partial: [pageNumber] }));
        const images = imageSchema.parse(await parser.getImage({ partial: [pageNumber] }));
        return {
          text: text.pages.find((p) => p.num === pageNumber)?.text ?? "",
          images: images.pages.flatMap((p) =>
            p.images.map((image) => ({
              data: image.data,
              width: image.width,
              height: image.height,
              format: "png",
            })),
          ),
        };
      },
      async renderPage(pageNumber: number): Promise<Uint8Array> {
        const shot = screenshotSchema.parse(await parser.getScreenshot({ partial: [pageNumber], scale: 2 }));
        const page = shot.pages[0];
        if (!page) throw new Error(`Page ${pageNumber} did not render`);
        return page.data;
      },
      async close(): Promise<void> {
        await parser.destroy();
      },
    };
  }
}
