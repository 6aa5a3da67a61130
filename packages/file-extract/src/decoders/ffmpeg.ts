import { z } from "zod";
import type { PcmDecoder } from "../extractors/audio.js";
import type { VideoProbe, VideoToolkit } from "../extractors/video.js";
import { runProcess } from "../lib/process.js";
import { extensionSuffix, withTempFile } from "../lib/temp.js";
import { type PcmAudio, YIELD_INTERVAL, yieldToLoop } from "../lib/waveform.js";
import type { ExtractInput } from "../types.js";

export interface FfmpegOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
}

const PCM_SAMPLE_RATE = 16_000;

const probeSchema = z.object({
  format: z
    .object({
      format_name: z.string().optional(),
      duration: z.string().optional(),
    })
    .optional(),
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        channels: z.number().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        avg_frame_rate: z.string().optional(),
      }),
    )
    .default([]),
});

type ProbeOutput = z.infer<typeof probeSchema>;

function parseRate(rate: string | undefined): number | null {
  if (!rate) return null;
  const [num, den] = rate.split("/").map(Number);
  if (num === undefined || !Number.isFinite(num)) return null;
  const value = den === undefined ? num : den === 0 ? Number.NaN : num / den;
  return Number.isFinite(value) && value > 0 ? Math.round(value * 1000) / 1000 : null;
}

function parseDuration(duration: string | undefined): number | null {
  const value = Number(duration);
  return duration !== undefined && Number.isFinite(value) ? value : null;
}

async function ffprobe(path: string, file: string, signal: AbortSignal): Promise<ProbeOutput> {
  const out = await runProcess(
    path,
    ["-v", "error", "-print_format", "json", "-show_format", "-show_streams", file],
    { signal },
  );
  return probeSchema.parse(JSON.parse(out.toString("utf-8")));
}

/** Decodes any container ffmpeg understands to mono 32-bit float PCM. */
export class FfmpegPcmDecoder implements PcmDecoder {
  private ffmpegPath: string;
  private ffprobePath: string;

  constructor(options: FfmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.ffprobePath = options.ffprobePath ?? "ffprobe";
  }

  async decode(input: ExtractInput, signal: AbortSignal): Promise<PcmAudio> {
    return withTempFile(input.bytes, extensionSuffix(input.filename), async (file) => {
      const probe = await ffprobe(this.ffprobePath, file, signal);
      const stream = probe.streams.find((s) => s.codec_type === "audio");
      if (!stream) throw new Error("No audio stream found");

      const raw = await runProcess(
        this.ffmpegPath,
        [
          ...["-v", "error", "-i", file, "-vn"],
          ...["-f", "f32le", "-ac", "1", "-ar", String(PCM_SAMPLE_RATE), "pipe:1"],
        ],
        { signal },
      );
      const samples = new Float32Array(Math.floor(raw.length / 4));
      for (let i = 0; i < samples.length; i++) {
        if (i > 0 && i % YIELD_INTERVAL === 0) await yieldToLoop(signal);
        samples[i] = raw.readFloatLE(i * 4);
      }
      return { sampleRate: PCM_SAMPLE_RATE, channels: stream.channels ?? null, samples };
    });
  }
}

export class FfmpegVideoToolkit implements VideoToolkit {
  private ffmpegPath: string;
  private ffprobePath: string;

  constructor(options: FfmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.ffprobePath = options.ffprobePath ?? "ffprobe";
  }

  async probe(file: string, signal: AbortSignal): Promise<VideoProbe> {
    const probe = await ffprobe(this.ffprobePath, file, signal);
    const video = probe.streams.find((s) => s.codec_type === "video");
    if (!video) throw new Error("No video stream found");

    return {
      container: probe.format?.format_name ?? null,
      duration: parseDuration(probe.format?.duration),
      width: video.width ?? null,
      height: video.height ?? null,
      codec: video.codec_name ?? null,
      frameRate: parseRate(video.avg_frame_rate),
      hasAudio: probe.streams.some((s) => s.codec_type === "audio"),
    };
  }

  async grabFrame(file: string, seconds: number, signal: AbortSignal): Promise<Buffer> {
    const frame = await runProcess(
      this.ffmpegPath,
      [
        "-v",
        "error",
        "-ss",
        String(seconds),
        "-i",
        file,
        "-frames:v",
        "1",
        "-f",
        "image2pipe",
        "-vcodec",
        "png",
        "pipe:1",
      ],
      { signal },
    );
    if (frame.length === 0) throw new Error(`No frame decoded at ${seconds}s`);
    return frame;
  }
}

/** True when both binaries answer `-version`. */
export async function ffmpegAvailable(options: FfmpegOptions = {}): Promise<boolean> {
  try {
    await runProcess(options.ffmpegPath ?? "ffmpeg", ["-version"], {
      signal: AbortSignal.timeout(5_000),
    });
    await runProcess(options.ffprobePath ?? "ffprobe", ["-version"], {
      signal: AbortSignal.timeout(5_000),
    });
    return true;
  } catch {
    return false;
  }
}
