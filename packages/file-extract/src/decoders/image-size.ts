import type { ImageInfo, ImageProbe } from "../extractors/image.js";

export class ImageSizeProbe implements ImageProbe {
  async probe(bytes: Buffer): Promise<ImageInfo> {
    const { imageSize } = await import("image-size");
    const size = imageSize(bytes);
    if (size.width === undefined || size.height === undefined) {
      throw new Error("Image dimensions could not be read");
    }
    return {
      width: size.width,
      height: size.height,
      type: size.type ?? null,
      orientation: size.orientation ?? null,
    };
  }
}
