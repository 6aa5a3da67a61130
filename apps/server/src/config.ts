import {
  DEFAULT_AUDIO_SEGMENT_SECONDS,
  DEFAULT_JOB_TIMEOUT_MS,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_VIDEO_FRAME_INTERVAL_S,
  DEFAULT_VIDEO_MAX_FRAMES,
  DEFAULT_WORKER_COUNT,
  MAX_UPLOAD_MB,
} from "@mediasift/utils";
import type { MinioStoreConfig } from "@mediasift/storage";
import { z } from "zod";

const flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().default("0.0.0.0"),

  STORAGE_BACKEND: z.enum(["fs", "minio"]).default("fs"),
  STORAGE_ROOT: z.string().default("./storage"),
  MINIO_ENDPOINT: z.string().default("localhost"),
  MINIO_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
  MINIO_USE_SSL: flag,
  MINIO_ACCESS_KEY: z.string().default("minioadmin"),
  MINIO_SECRET_KEY: z.string().default("minioadmin"),
  MINIO_BUCKET: z.string().default("mediasift"),

  DATABASE_URL: z.string().url().optional(),

  QUEUE_CAPACITY: z.coerce.number().int().min(1).default(DEFAULT_QUEUE_CAPACITY),
  JOB_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_JOB_TIMEOUT_MS),
  // single extraction worker in deployment
  WORKER_COUNT: z.coerce
    .number()
    .int()
    .refine((value) => value === 1, "Only a single worker is supported")
    .default(DEFAULT_WORKER_COUNT),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(MAX_UPLOAD_MB),

  FFMPEG_PATH: z.string().default("ffmpeg"),
  FFPROBE_PATH: z.string().default("ffprobe"),
  VIDEO_FRAME_INTERVAL_S: z.coerce.number().positive().default(DEFAULT_VIDEO_FRAME_INTERVAL_S),
  VIDEO_MAX_FRAMES: z.coerce.number().int().min(1).default(DEFAULT_VIDEO_MAX_FRAMES),
  AUDIO_SEGMENT_SECONDS: z.coerce.number().positive().default(DEFAULT_AUDIO_SEGMENT_SECONDS),
});

export type StorageConfig =
  | { backend: "fs"; root: string }
  | { backend: "minio"; minio: MinioStoreConfig };

export interface AppConfig {
  port: number;
  host: string;
  storage: StorageConfig;
  databaseUrl: string | null;
  queueCapacity: number;
  jobTimeoutMs: number;
  workerCount: number;
  maxUploadBytes: number;
  ffmpeg: { ffmpegPath: string; ffprobePath: string };
  video: { frameIntervalSeconds: number; maxFrames: number };
  audio: { segmentSeconds: number };
}

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

/** Parses the environment once at startup. Empty variables count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const e = result.data;

  return {
    port: e.PORT,
    host: e.HOST,
    storage:
      e.STORAGE_BACKEND === "minio"
        ? {
            backend: "minio",
            minio: {
              endPoint: e.MINIO_ENDPOINT,
              port: e.MINIO_PORT,
              useSSL: e.MINIO_USE_SSL,
              accessKey: e.MINIO_ACCESS_KEY,
              secretKey: e.MINIO_SECRET_KEY,
              bucket: e.MINIO_BUCKET,
            },
          }
        : { backend: "fs", root: e.STORAGE_ROOT },
    databaseUrl: e.DATABASE_URL ?? null,
    queueCapacity: e.QUEUE_CAPACITY,
    jobTimeoutMs: e.JOB_TIMEOUT_MS,
    workerCount: e.WORKER_COUNT,
    maxUploadBytes: Math.floor(e.MAX_UPLOAD_MB * 1024 * 1024),
    ffmpeg: { ffmpegPath: e.FFMPEG_PATH, ffprobePath: e.FFPROBE_PATH },
    video: { frameIntervalSeconds: e.VIDEO_FRAME_INTERVAL_S, maxFrames: e.VIDEO_MAX_FRAMES },
    audio: { segmentSeconds: e.AUDIO_SEGMENT_SECONDS },
  };
}
