export const MAX_UPLOAD_MB = 100;
export const MAX_UPLOAD_BYTES = MAX_UPLOAD_MB * 1024 * 1024;

/** Bytes handed to the classifier; signatures never sit deeper than this. */
export const SNIFF_BYTES = 4096;

export const EXTRACTABLE_FORMATS = ["pdf", "image", "audio", "video", "xml"] as const;
export type ExtractableFormat = (typeof EXTRACTABLE_FORMATS)[number];

export const MEDIA_FORMATS = [...EXTRACTABLE_FORMATS, "unknown"] as const;
export type MediaFormat = (typeof MEDIA_FORMATS)[number];

export const JOB_STATUSES = ["queued", "running", "succeeded", "failed"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const JOB_ERROR_KINDS = [
  "UNSUPPORTED_FORMAT",
  "EXTRACTION_TIMEOUT",
  "EXTRACTION_FAILED",
  "STORAGE_ERROR",
  "CANCELLED",
  "INTERRUPTED",
] as const;
export type JobErrorKind = (typeof JOB_ERROR_KINDS)[number];

export const DEFAULT_QUEUE_CAPACITY = 16;
export const DEFAULT_JOB_TIMEOUT_MS = 120_000;
export const DEFAULT_WORKER_COUNT = 1;

export const STORAGE_RETRY_ATTEMPTS = 3;
export const STORAGE_RETRY_DELAY_MS = 50;

export const DEFAULT_VIDEO_FRAME_INTERVAL_S = 10;
export const DEFAULT_VIDEO_MAX_FRAMES = 12;
export const DEFAULT_AUDIO_SEGMENT_SECONDS = 1;

export const JOB_LIST_DEFAULT_LIMIT = 50;
export const JOB_LIST_MAX_LIMIT = 200;
