import { JOB_STATUSES, type JobStatus } from "./constants.js";
import {
  AppError,
  ConflictError,
  ExtractionFailedError,
  JobFailure,
  errorMessage,
} from "./errors.js";
import type { JobError } from "./types/job.js";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["running", "failed"],
  running: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Statuses a job may be in for an update to `to` to be accepted. */
export function predecessorsOf(to: JobStatus): JobStatus[] {
  return JOB_STATUSES.filter((from) => canTransition(from, to));
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function assertTransition(id: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new ConflictError(`Job ${id} cannot move from ${from} to ${to}`);
  }
}

export function toJobError(err: unknown): JobError {
  if (err instanceof JobFailure) {
    return {
      kind: err.kind,
      message: err.message,
      detail: err.detail ?? null,
      hasPartialResult: err instanceof ExtractionFailedError && err.partial !== undefined,
    };
  }
  // Anything else escaped a decoder boundary: keep the raw text internal only.
  return {
    kind: "EXTRACTION_FAILED",
    message: err instanceof AppError ? err.message : "Extraction failed",
    detail: errorMessage(err),
    hasPartialResult: false,
  };
}
