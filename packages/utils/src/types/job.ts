import type { JobErrorKind, JobStatus, MediaFormat } from "../constants.js";

export interface ArtifactRef {
  hash: string;
  size: number;
}

export interface JobError {
  kind: JobErrorKind;
  message: string;
  detail: string | null;
  hasPartialResult: boolean;
}

export interface Job {
  id: string;
  artifact: ArtifactRef;
  filename: string | null;
  declaredMime: string | null;
  format: MediaFormat | null;
  status: JobStatus;
  enqueuedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  error: JobError | null;
}

export type NewJob = Pick<Job, "id" | "artifact" | "filename" | "declaredMime">;

export interface JobUpdate {
  status?: JobStatus;
  format?: MediaFormat | null;
  startedAt?: Date | null;
  finishedAt?: Date | null;
  error?: JobError | null;
}

export interface JobListOptions {
  status?: JobStatus;
  limit: number;
}

/**
 * Persistence for job records. Implementations reject updates that would move
 * a job backwards (see `canTransition`) with a `ConflictError`.
 */
export interface JobStore {
  create(job: NewJob): Promise<Job>;
  get(id: string): Promise<Job | null>;
  update(id: string, data: JobUpdate): Promise<Job>;
  list(options: JobListOptions): Promise<Job[]>;
  delete(id: string): Promise<boolean>;
  /** Fails every job left queued or running by a previous process. */
  failInterrupted(error: JobError, at: Date): Promise<number>;
}
