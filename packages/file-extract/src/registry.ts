import {
  ConflictError,
  type ExtractableFormat,
  type MediaFormat,
  UnsupportedFormatError,
} from "@mediasift/utils";
import { type AudioExtractorOptions, AudioExtractor } from "./extractors/audio.js";
import { type ImageExtractorOptions, ImageExtractor } from "./extractors/image.js";
import { type PdfExtractorOptions, PdfExtractor } from "./extractors/pdf.js";
import { type VideoExtractorOptions, VideoExtractor } from "./extractors/video.js";
import { XmlExtractor } from "./extractors/xml.js";
import type { Extractor } from "./types.js";

export class ExtractorRegistry {
  private extractors = new Map<ExtractableFormat, Extractor>();

  register(extractor: Extractor): void {
    const existing = this.extractors.get(extractor.format);
    if (existing) {
      throw new ConflictError(
        `Format "${extractor.format}" is already handled by ${existing.name}@${existing.version}`,
      );
    }
    this.extractors.set(extractor.format, extractor);
  }

  get(format: MediaFormat): Extractor {
    const extractor = format === "unknown" ? undefined : this.extractors.get(format);
    if (!extractor) {
      throw new UnsupportedFormatError(`No extractor available for format "${format}"`);
    }
    return extractor;
  }

  has(format: MediaFormat): boolean {
    return format !== "unknown" && this.extractors.has(format);
  }

  formats(): ExtractableFormat[] {
    return [...this.extractors.keys()];
  }
}

export interface DefaultRegistryOptions {
  pdf?: PdfExtractorOptions;
  image?: ImageExtractorOptions;
  audio?: AudioExtractorOptions;
  video?: VideoExtractorOptions;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  registry.register(new PdfExtractor(options.pdf));
  registry.register(new ImageExtractor(options.image));
  registry.register(new AudioExtractor(options.audio));
  registry.register(new VideoExtractor(options.video));
  registry.register(new XmlExtractor());
  return registry;
}
