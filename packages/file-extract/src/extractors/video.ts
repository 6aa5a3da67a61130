import {
  DEFAULT_VIDEO_FRAME_INTERVAL_S,
  DEFAULT_VIDEO_MAX_FRAMES,
  ExtractionFailedError,
  type ExtractionResult,
  type MetadataValue,
  type Segment,
  UnsupportedFormatError,
  errorMessage,
} from "@mediasift/utils";
import { FfmpegVideoToolkit } from "../decoders/ffmpeg.js";
import { ProcessLaunchError } from "../lib/process.js";
import { buildResult, pngDimensions } from "../lib/result.js";
import { extensionSuffix, withTempFile } from "../lib/temp.js";
import { round6 } from "../lib/waveform.js";
import type { ExtractInput, ExtractionContext, Extractor } from "../types.js";

export interface VideoProbe {
  container: string | null;
  duration: number | null;
  width: number | null;
  height: number | null;
  codec: string | null;
  frameRate: number | null;
  hasAudio: boolean;
}

export interface VideoToolkit {
  probe(file: string, signal: AbortSignal): Promise<VideoProbe>;
  /** One PNG-encoded frame at `seconds`. */
  grabFrame(file: string, seconds: number, signal: AbortSignal): Promise<Buffer>;
}

export interface VideoExtractorOptions {
  toolkit?: VideoToolkit;
  frameIntervalSeconds?: number;
  maxFrames?: number;
}

export function sampleTimes(
  duration: number | null,
  intervalSeconds: number,
  maxFrames: number,
): number[] {
  if (duration === null || duration <= 0) return maxFrames > 0 ? [0] : [];
  const times: number[] = [];
  for (let t = 0; t < duration && times.length < maxFrames; t += intervalSeconds) {
    times.push(round6(t));
  }
  return times;
}

export class VideoExtractor implements Extractor {
  readonly format = "video";
  readonly name = "video";
  readonly version = "1";

  private toolkit: VideoToolkit;
  private frameIntervalSeconds: number;
  private maxFrames: number;

  constructor(options: VideoExtractorOptions = {}) {
    this.toolkit = options.toolkit ?? new FfmpegVideoToolkit();
    this.frameIntervalSeconds = options.frameIntervalSeconds ?? DEFAULT_VIDEO_FRAME_INTERVAL_S;
    this.maxFrames = options.maxFrames ?? DEFAULT_VIDEO_MAX_FRAMES;
  }

  async extract(input: ExtractInput, ctx: ExtractionContext): Promise<ExtractionResult> {
    return withTempFile(input.bytes, extensionSuffix(input.filename), async (file) => {
      let probe: VideoProbe;
      try {
        probe = await this.toolkit.probe(file, ctx.signal);
      } catch (err) {
        ctx.signal.throwIfAborted();
        if (err instanceof ProcessLaunchError) {
          throw new ExtractionFailedError("The video decoder is not available", errorMessage(err));
        }
        throw new UnsupportedFormatError("The video container could not be read", errorMessage(err));
      }

      const metadata: Record<string, MetadataValue> = {
        container: probe.container,
        duration: probe.duration,
        width: probe.width,
        height: probe.height,
        codec: probe.codec,
        frameRate: probe.frameRate,
        hasAudio: probe.hasAudio,
      };
      const segments: Segment[] = [];

      for (const time of sampleTimes(probe.duration, this.frameIntervalSeconds, this.maxFrames)) {
        ctx.signal.throwIfAborted();

        let frame: Buffer;
        try {
          frame = await this.toolkit.grabFrame(file, time, ctx.signal);
        } catch (err) {
          ctx.signal.throwIfAborted();
          throw new ExtractionFailedError(
            `Failed to decode the frame at ${time}s`,
            errorMessage(err),
            segments.length > 0 ? buildResult(this, input, metadata, segments) : undefined,
          );
        }

        const artifact = await ctx.storeDerived(frame);
        const { width, height } = pngDimensions(frame);
        segments.push({
          type: "image",
          page: null,
          time,
          region: null,
          width,
          height,
          format: "png",
          artifact,
        });
      }

      return buildResult(this, input, metadata, segments);
    });
  }
}
