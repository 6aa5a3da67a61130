import {
  type Job,
  type JobError,
  type JobListOptions,
  type JobStore,
  type JobUpdate,
  type NewJob,
  NotFoundError,
  assertTransition,
  predecessorsOf,
} from "@mediasift/utils";
import { and, desc, eq, inArray } from "drizzle-orm";
import type { Database } from "../client.js";
import { type JobRow, jobs } from "../schema/jobs.js";

type JobRowUpdate = Partial<typeof jobs.$inferInsert>;

export function toJob(row: JobRow): Job {
  return {
    id: row.id,
    artifact: { hash: row.artifact_hash, size: row.artifact_size },
    filename: row.filename,
    declaredMime: row.declared_mime,
    format: row.format,
    status: row.status,
    enqueuedAt: row.enqueued_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    error:
      row.error_kind === null
        ? null
        : {
            kind: row.error_kind,
            message: row.error_message ?? "",
            detail: row.error_detail,
            hasPartialResult: row.has_partial_result,
          },
  };
}

function errorColumns(error: JobError | null): JobRowUpdate {
  return {
    error_kind: error?.kind ?? null,
    error_message: error?.message ?? null,
    error_detail: error?.detail ?? null,
    has_partial_result: error?.hasPartialResult ?? false,
  };
}

export function toRowUpdate(data: JobUpdate): JobRowUpdate {
  const row: JobRowUpdate = {};
  if (data.status !== undefined) row.status = data.status;
  if (data.format !== undefined) row.format = data.format;
  if (data.startedAt !== undefined) row.started_at = data.startedAt;
  if (data.finishedAt !== undefined) row.finished_at = data.finishedAt;
  if (data.error !== undefined) Object.assign(row, errorColumns(data.error));
  return row;
}

export class JobRepository implements JobStore {
  constructor(private db: Database) {}

  async create(job: NewJob): Promise<Job> {
    const result = await this.db
      .insert(jobs)
      .values({
        id: job.id,
        artifact_hash: job.artifact.hash,
        artifact_size: job.artifact.size,
        filename: job.filename,
        declared_mime: job.declaredMime,
      })
      .returning();
    const row = result[0];
    if (!row) throw new Error(`Insert of job ${job.id} returned no row`);
    return toJob(row);
  }

  async get(id: string): Promise<Job | null> {
    const result = await this.db.select().from(jobs).where(eq(jobs.id, id)).limit(1);
    return result[0] ? toJob(result[0]) : null;
  }

  /** Status changes are guarded in the WHERE clause so concurrent writers cannot move a job backwards. */
  async update(id: string, data: JobUpdate): Promise<Job> {
    const guard =
      data.status === undefined
        ? eq(jobs.id, id)
        : and(eq(jobs.id, id), inArray(jobs.status, predecessorsOf(data.status)));

    const result = await this.db.update(jobs).set(toRowUpdate(data)).where(guard).returning();
    if (result[0]) return toJob(result[0]);

    const existing = await this.get(id);
    if (!existing) throw new NotFoundError(`Job ${id} not found`);
    assertTransition(id, existing.status, data.status ?? existing.status);
    throw new Error(`Update of job ${id} matched no row`);
  }

  async list(options: JobListOptions): Promise<Job[]> {
    const rows = await this.db
      .select()
      .from(jobs)
      .where(options.status ? eq(jobs.status, options.status) : undefined)
      .orderBy(desc(jobs.enqueued_at), desc(jobs.id))
      .limit(options.limit);
    return rows.map(toJob);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.delete(jobs).where(eq(jobs.id, id)).returning({ id: jobs.id });
    return result.length > 0;
  }

  async failInterrupted(error: JobError, at: Date): Promise<number> {
    const result = await this.db
      .update(jobs)
      .set({ status: "failed", finished_at: at, ...errorColumns(error) })
      .where(inArray(jobs.status, ["queued", "running"]))
      .returning({ id: jobs.id });
    return result.length;
  }
}
