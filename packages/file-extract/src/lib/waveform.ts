import { setImmediate } from "node:timers/promises";
import type { AudioSegment } from "@mediasift/utils";

/** Samples processed between returns to the event loop. */
export const YIELD_INTERVAL = 1 << 16;

/** Lets timers and requests run, then surfaces an abort that happened meanwhile. */
export async function yieldToLoop(signal?: AbortSignal): Promise<void> {
  await setImmediate();
  signal?.throwIfAborted();
}

export interface PcmAudio {
  sampleRate: number;
  /** Channel count of the source; samples are always downmixed to mono. */
  channels: number | null;
  samples: Float32Array;
}

export function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function durationOf(audio: PcmAudio): number {
  return audio.sampleRate > 0 ? audio.samples.length / audio.sampleRate : 0;
}

/**
 * Splits the signal into fixed windows and reduces each to
 * [rms, peak, zeroCrossingRate]. The last window may be shorter.
 */
export async function summarizeWaveform(
  audio: PcmAudio,
  windowSeconds: number,
  signal?: AbortSignal,
): Promise<AudioSegment[]> {
  const windowSize = Math.max(1, Math.round(windowSeconds * audio.sampleRate));
  const segments: AudioSegment[] = [];
  let sinceYield = 0;

  for (let start = 0; start < audio.samples.length; start += windowSize) {
    signal?.throwIfAborted();
    if (sinceYield >= YIELD_INTERVAL) {
      await yieldToLoop(signal);
      sinceYield = 0;
    }
    const end = Math.min(start + windowSize, audio.samples.length);

    let sumSquares = 0;
    let peak = 0;
    let crossings = 0;
    let previous: number | undefined;
    for (let i = start; i < end; i++) {
      const sample = audio.samples[i] ?? 0;
      sumSquares += sample * sample;
      peak = Math.max(peak, Math.abs(sample));
      if (previous !== undefined && (previous >= 0) !== (sample >= 0)) crossings++;
      previous = sample;
    }

    const count = end - start;
    sinceYield += count;
    segments.push({
      type: "audio",
      start: round6(start / audio.sampleRate),
      end: round6(end / audio.sampleRate),
      features: [
        round6(Math.sqrt(sumSquares / count)),
        round6(peak),
        round6(count > 1 ? crossings / (count - 1) : 0),
      ],
    });
  }

  return segments;
}
