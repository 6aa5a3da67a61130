import {
  DEFAULT_AUDIO_SEGMENT_SECONDS,
  ExtractionFailedError,
  type ExtractionResult,
  UnsupportedFormatError,
  errorMessage,
} from "@mediasift/utils";
import { FfmpegPcmDecoder } from "../decoders/ffmpeg.js";
import { decodeWav } from "../decoders/wav.js";
import { ProcessLaunchError } from "../lib/process.js";
import { buildResult } from "../lib/result.js";
import { type PcmAudio, durationOf, round6, summarizeWaveform } from "../lib/waveform.js";
import type { ExtractInput, ExtractionContext, Extractor } from "../types.js";

export interface PcmDecoder {
  decode(input: ExtractInput, signal: AbortSignal): Promise<PcmAudio>;
}

/** Uncompressed WAV is decoded in process; everything else goes through ffmpeg. */
export class DefaultPcmDecoder implements PcmDecoder {
  constructor(private fallback: PcmDecoder = new FfmpegPcmDecoder()) {}

  async decode(input: ExtractInput, signal: AbortSignal): Promise<PcmAudio> {
    const isWave =
      input.bytes.toString("ascii", 0, 4) === "RIFF" &&
      input.bytes.toString("ascii", 8, 12) === "WAVE";
    if (isWave) {
      const pcm = await decodeWav(input.bytes, signal);
      if (pcm) return pcm;
    }
    return this.fallback.decode(input, signal);
  }
}

export interface AudioExtractorOptions {
  decoder?: PcmDecoder;
  segmentSeconds?: number;
}

export class AudioExtractor implements Extractor {
  readonly format = "audio";
  readonly name = "audio";
  readonly version = "1";

  private decoder: PcmDecoder;
  private segmentSeconds: number;

  constructor(options: AudioExtractorOptions = {}) {
    this.decoder = options.decoder ?? new DefaultPcmDecoder();
    this.segmentSeconds = options.segmentSeconds ?? DEFAULT_AUDIO_SEGMENT_SECONDS;
  }

  async extract(input: ExtractInput, ctx: ExtractionContext): Promise<ExtractionResult> {
    let pcm: PcmAudio;
    try {
      pcm = await this.decoder.decode(input, ctx.signal);
    } catch (err) {
      ctx.signal.throwIfAborted();
      if (err instanceof ProcessLaunchError) {
        throw new ExtractionFailedError("The audio decoder is not available", errorMessage(err));
      }
      throw new UnsupportedFormatError("The audio stream could not be decoded", errorMessage(err));
    }

    const segments = await summarizeWaveform(pcm, this.segmentSeconds, ctx.signal);
    return buildResult(
      this,
      input,
      {
        sampleRate: pcm.sampleRate,
        channels: pcm.channels,
        duration: round6(durationOf(pcm)),
        segmentSeconds: this.segmentSeconds,
      },
      segments,
    );
  }
}
