import { z } from "zod";
import {
  JOB_LIST_DEFAULT_LIMIT,
  JOB_LIST_MAX_LIMIT,
  JOB_STATUSES,
  type JobErrorKind,
  type JobStatus,
  type MediaFormat,
} from "../constants.js";
import type { ExtractionResult } from "./extraction.js";
import type { ArtifactRef } from "./job.js";

export const jobListQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(JOB_LIST_MAX_LIMIT).default(JOB_LIST_DEFAULT_LIMIT),
});

export type JobListQuery = z.infer<typeof jobListQuerySchema>;

export const jobIdSchema = z.string().uuid();

export const artifactHashSchema = z.string().regex(/^[0-9a-f]{64}$/, "Expected a SHA-256 hex digest");

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, string[]>;
  };
}

export interface JobErrorView {
  kind: JobErrorKind;
  message: string;
  partial?: ExtractionResult;
}

export interface JobView {
  id: string;
  status: JobStatus;
  format: MediaFormat | null;
  filename: string | null;
  artifact: ArtifactRef;
  enqueuedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  result?: ExtractionResult;
  error?: JobErrorView;
}
