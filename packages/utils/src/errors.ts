import type { JobErrorKind } from "./constants.js";
import type { ExtractionResult } from "./types/extraction.js";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(404, "NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  constructor(
    message = "Validation failed",
    public details?: Record<string, string[]>,
  ) {
    super(400, "VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict") {
    super(409, "CONFLICT", message);
    this.name = "ConflictError";
  }
}

export class QueueFullError extends AppError {
  constructor(
    public capacity: number,
    message = "Extraction queue is full, retry later",
  ) {
    super(429, "QUEUE_FULL", message);
    this.name = "QueueFullError";
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = "Service unavailable") {
    super(503, "SERVICE_UNAVAILABLE", message);
    this.name = "ServiceUnavailableError";
  }
}

/**
 * Failure that ends a job. `detail` keeps the raw cause (decoder stderr,
 * errno text) for logs and the job record; it is never sent to callers.
 */
export abstract class JobFailure extends AppError {
  abstract readonly kind: JobErrorKind;

  constructor(
    statusCode: number,
    code: JobErrorKind,
    message: string,
    public detail?: string,
  ) {
    super(statusCode, code, message);
  }
}

export class UnsupportedFormatError extends JobFailure {
  readonly kind = "UNSUPPORTED_FORMAT";

  constructor(message = "Unsupported file format", detail?: string) {
    super(415, "UNSUPPORTED_FORMAT", message, detail);
    this.name = "UnsupportedFormatError";
  }
}

export class ExtractionTimeoutError extends JobFailure {
  readonly kind = "EXTRACTION_TIMEOUT";

  constructor(public timeoutMs: number) {
    super(504, "EXTRACTION_TIMEOUT", `Extraction exceeded ${timeoutMs}ms`);
    this.name = "ExtractionTimeoutError";
  }
}

export class ExtractionFailedError extends JobFailure {
  readonly kind = "EXTRACTION_FAILED";

  constructor(
    message: string,
    detail?: string,
    public partial?: ExtractionResult,
  ) {
    super(422, "EXTRACTION_FAILED", message, detail);
    this.name = "ExtractionFailedError";
  }
}

export class StorageError extends JobFailure {
  readonly kind = "STORAGE_ERROR";

  constructor(
    message: string,
    detail?: string,
    public transient = false,
  ) {
    super(503, "STORAGE_ERROR", message, detail);
    this.name = "StorageError";
  }
}

export class CancelledError extends JobFailure {
  readonly kind = "CANCELLED";

  constructor(message = "Job was cancelled") {
    super(409, "CANCELLED", message);
    this.name = "CancelledError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
