export { assertSupported, classify } from "./classifier.js";
export type { Classification, ClassificationSource } from "./classifier.js";
export { createDefaultRegistry, ExtractorRegistry } from "./registry.js";
export type { DefaultRegistryOptions } from "./registry.js";
export type { ExtractInput, ExtractionContext, Extractor } from "./types.js";

export { AudioExtractor, DefaultPcmDecoder } from "./extractors/audio.js";
export type { AudioExtractorOptions, PcmDecoder } from "./extractors/audio.js";
export { ImageExtractor } from "./extractors/image.js";
export type { ImageExtractorOptions, ImageInfo, ImageProbe, OcrEngine } from "./extractors/image.js";
export { PdfExtractor } from "./extractors/pdf.js";
export type {
  PdfDecoder,
  PdfExtractorOptions,
  PdfHandle,
  PdfImage,
  PdfInfo,
  PdfPage,
} from "./extractors/pdf.js";
export { sampleTimes, VideoExtractor } from "./extractors/video.js";
export type { VideoExtractorOptions, VideoProbe, VideoToolkit } from "./extractors/video.js";
export { XmlExtractor } from "./extractors/xml.js";

export { FfmpegPcmDecoder, FfmpegVideoToolkit, ffmpegAvailable } from "./decoders/ffmpeg.js";
export type { FfmpegOptions } from "./decoders/ffmpeg.js";
export { decodeWav, WavDecodeError } from "./decoders/wav.js";
export { ProcessError, ProcessLaunchError } from "./lib/process.js";
export { summarizeWaveform } from "./lib/waveform.js";
export type { PcmAudio } from "./lib/waveform.js";
