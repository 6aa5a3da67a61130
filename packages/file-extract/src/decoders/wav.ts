import { type PcmAudio, YIELD_INTERVAL, yieldToLoop } from "../lib/waveform.js";

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

export class WavDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WavDecodeError";
  }
}

function readSample(buf: Buffer, offset: number, format: WavFormat): number {
  if (format.audioFormat === WAVE_FORMAT_IEEE_FLOAT) {
    return format.bitsPerSample === 64 ? buf.readDoubleLE(offset) : buf.readFloatLE(offset);
  }
  switch (format.bitsPerSample) {
    case 8:
      return (buf.readUInt8(offset) - 128) / 128;
    case 16:
      return buf.readInt16LE(offset) / 32768;
    case 24:
      return buf.readIntLE(offset, 3) / 8388608;
    case 32:
      return buf.readInt32LE(offset) / 2147483648;
    default:
      throw new WavDecodeError(`Unsupported PCM bit depth ${format.bitsPerSample}`);
  }
}

function readFormat(buf: Buffer, offset: number, size: number): WavFormat {
  if (size < 16) throw new WavDecodeError("fmt chunk too short");
  let audioFormat = buf.readUInt16LE(offset);
  if (audioFormat === WAVE_FORMAT_EXTENSIBLE && size >= 26) {
    // First two bytes of the sub-format GUID hold the real format code.
    audioFormat = buf.readUInt16LE(offset + 24);
  }
  return {
    audioFormat,
    channels: buf.readUInt16LE(offset + 2),
    sampleRate: buf.readUInt32LE(offset + 4),
    bitsPerSample: buf.readUInt16LE(offset + 14),
  };
}

/**
 * Decodes uncompressed RIFF/WAVE in process and downmixes to mono. Returns null
 * for compressed WAVE payloads (ADPCM, µ-law, ...), which need ffmpeg.
 */
export async function decodeWav(buf: Buffer, signal?: AbortSignal): Promise<PcmAudio | null> {
  const isWave =
    buf.length >= 12 &&
    buf.toString("ascii", 0, 4) === "RIFF" &&
    buf.toString("ascii", 8, 12) === "WAVE";
  if (!isWave) {
    throw new WavDecodeError("Not a RIFF/WAVE file");
  }

  let format: WavFormat | null = null;
  let offset = 12;
  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      format = readFormat(buf, body, size);
      const { audioFormat } = format;
      if (audioFormat !== WAVE_FORMAT_PCM && audioFormat !== WAVE_FORMAT_IEEE_FLOAT) return null;
    } else if (id === "data") {
      if (!format) throw new WavDecodeError("data chunk before fmt chunk");
      if (format.channels === 0 || format.sampleRate === 0) {
        throw new WavDecodeError("fmt chunk declares no channels or no sample rate");
      }
      const bytesPerSample = format.bitsPerSample / 8;
      const frameSize = bytesPerSample * format.channels;
      // Streamed WAVs may declare a size past the end of what was written.
      const available = Math.min(size, buf.length - body);
      const frames = Math.floor(available / frameSize);
      const samples = new Float32Array(frames);
      for (let frame = 0; frame < frames; frame++) {
        if (frame > 0 && frame % YIELD_INTERVAL === 0) await yieldToLoop(signal);
        let sum = 0;
        for (let ch = 0; ch < format.channels; ch++) {
          sum += readSample(buf, body + frame * frameSize + ch * bytesPerSample, format);
        }
        samples[frame] = sum / format.channels;
      }
      return { sampleRate: format.sampleRate, channels: format.channels, samples };
    }

    offset = body + size + (size % 2);
  }

  throw new WavDecodeError("No data chunk found");
}
