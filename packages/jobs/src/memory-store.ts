import {
  type Job,
  type JobError,
  type JobListOptions,
  type JobStore,
  type JobUpdate,
  type NewJob,
  NotFoundError,
  assertTransition,
} from "@mediasift/utils";

/** Job records held in process memory; lost on restart. */
export class MemoryJobStore implements JobStore {
  private jobs = new Map<string, Job>();

  constructor(private now: () => Date = () => new Date()) {}

  async create(data: NewJob): Promise<Job> {
    const job: Job = {
      ...data,
      artifact: { ...data.artifact },
      format: null,
      status: "queued",
      enqueuedAt: this.now(),
      startedAt: null,
      finishedAt: null,
      error: null,
    };
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  async get(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async update(id: string, data: JobUpdate): Promise<Job> {
    const job = this.jobs.get(id);
    if (!job) throw new NotFoundError(`Job ${id} not found`);
    if (data.status !== undefined) assertTransition(id, job.status, data.status);

    const updated: Job = { ...job };
    if (data.status !== undefined) updated.status = data.status;
    if (data.format !== undefined) updated.format = data.format;
    if (data.startedAt !== undefined) updated.startedAt = data.startedAt;
    if (data.finishedAt !== undefined) updated.finishedAt = data.finishedAt;
    if (data.error !== undefined) updated.error = data.error;
    this.jobs.set(id, updated);
    return structuredClone(updated);
  }

  /** Newest first; jobs enqueued in the same millisecond keep reverse insertion order. */
  async list(options: JobListOptions): Promise<Job[]> {
    return [...this.jobs.values()]
      .reverse()
      .filter((job) => options.status === undefined || job.status === options.status)
      .sort((a, b) => b.enqueuedAt.getTime() - a.enqueuedAt.getTime())
      .slice(0, options.limit)
      .map((job) => structuredClone(job));
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  async failInterrupted(error: JobError, at: Date): Promise<number> {
    let count = 0;
    for (const [id, job] of this.jobs) {
      if (job.status !== "queued" && job.status !== "running") continue;
      this.jobs.set(id, { ...job, status: "failed", finishedAt: at, error: { ...error } });
      count++;
    }
    return count;
  }
}
