import { randomUUID } from "node:crypto";
import type { ArtifactStore } from "@mediasift/storage";
import {
  CancelledError,
  ConflictError,
  DEFAULT_JOB_TIMEOUT_MS,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_WORKER_COUNT,
  ExtractionTimeoutError,
  type Job,
  type JobError,
  type JobListOptions,
  type JobStore,
  type NewJob,
  NotFoundError,
  QueueFullError,
  ServiceUnavailableError,
  errorMessage,
  isTerminal,
  toJobError,
} from "@mediasift/utils";
import type { ExtractionPipeline } from "./pipeline.js";
import { WorkerSlots } from "./worker-slots.js";

export interface SubmitInput {
  bytes: Uint8Array;
  filename: string | null;
  mime: string | null;
}

export interface CoordinatorOptions {
  jobs: JobStore;
  store: ArtifactStore;
  pipeline: ExtractionPipeline;
  /** Maximum number of jobs waiting for a worker. Running jobs do not count. */
  queueCapacity?: number;
  jobTimeoutMs?: number;
  workerCount?: number;
  now?: () => Date;
  generateId?: () => string;
}

export interface CoordinatorStats {
  queued: number;
  running: number;
  capacity: number;
  workers: number;
  accepting: boolean;
}

interface ActiveJob {
  controller: AbortController;
  done: Promise<void>;
  /** Set once the job is recording its success; it can no longer be cancelled. */
  committed: boolean;
}

const INTERRUPTED_ERROR: JobError = {
  kind: "INTERRUPTED",
  message: "Job was interrupted by a service restart",
  detail: null,
  hasPartialResult: false,
};

/**
 * Owns the FIFO queue and the worker slots. Job ids are queued here; the job
 * records themselves live in the `JobStore`.
 */
export class JobCoordinator {
  private jobs: JobStore;
  private store: ArtifactStore;
  private pipeline: ExtractionPipeline;
  private slots: WorkerSlots;
  private queueCapacity: number;
  private jobTimeoutMs: number;
  private now: () => Date;
  private generateId: () => string;

  private queue: string[] = [];
  /** Queue places claimed by submissions still writing their artifact. */
  private reserved = 0;
  private active = new Map<string, ActiveJob>();
  private idleWaiters: Array<() => void> = [];
  private closed = false;

  constructor(options: CoordinatorOptions) {
    this.jobs = options.jobs;
    this.store = options.store;
    this.pipeline = options.pipeline;
    this.slots = new WorkerSlots(options.workerCount ?? DEFAULT_WORKER_COUNT);
    this.queueCapacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    this.jobTimeoutMs = options.jobTimeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async submit(input: SubmitInput): Promise<Job> {
    this.reserveSlot();
    try {
      const artifact = await this.store.put(input.bytes);
      return await this.enqueue({
        id: this.generateId(),
        artifact,
        filename: input.filename,
        declaredMime: input.mime,
      });
    } finally {
      this.reserved--;
      this.pump();
    }
  }

  /** Queues a new job for an existing job's artifact. */
  async resubmit(jobId: string): Promise<Job> {
    const original = await this.status(jobId);
    this.reserveSlot();
    try {
      if (!(await this.store.has(original.artifact.hash))) {
        throw new NotFoundError(`Artifact of job ${jobId} is no longer stored`);
      }
      return await this.enqueue({
        id: this.generateId(),
        artifact: original.artifact,
        filename: original.filename,
        declaredMime: original.declaredMime,
      });
    } finally {
      this.reserved--;
      this.pump();
    }
  }

  async status(jobId: string): Promise<Job> {
    const job = await this.jobs.get(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId} not found`);
    return job;
  }

  /** Returns false when the job had already finished or is recording its success. */
  async cancel(jobId: string): Promise<boolean> {
    await this.status(jobId);

    const index = this.queue.indexOf(jobId);
    if (index !== -1) {
      this.queue.splice(index, 1);
      await this.fail(jobId, new CancelledError());
      this.checkIdle();
      return true;
    }

    const active = this.active.get(jobId);
    if (!active) return false;
    if (active.committed) {
      await active.done;
      return false;
    }
    active.controller.abort(new CancelledError());
    await active.done;
    return true;
  }

  /** Deletes a finished job's record and results. Its artifact stays. */
  async purge(jobId: string): Promise<void> {
    const job = await this.status(jobId);
    if (!isTerminal(job.status)) {
      throw new ConflictError(`Job ${jobId} is ${job.status}; cancel it before purging`);
    }
    await this.store.removeResults(jobId);
    await this.jobs.delete(jobId);
  }

  async list(options: JobListOptions): Promise<Job[]> {
    return this.jobs.list(options);
  }

  stats(): CoordinatorStats {
    return {
      queued: this.queue.length,
      running: this.active.size,
      capacity: this.queueCapacity,
      workers: this.slots.size,
      accepting: !this.closed,
    };
  }

  /** Resolves once nothing is queued, running or being submitted. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Marks jobs a previous process left queued or running as failed. Call before accepting work. */
  async recoverInterrupted(): Promise<number> {
    const count = await this.jobs.failInterrupted(INTERRUPTED_ERROR, this.now());
    if (count > 0) {
      console.warn(`[JobCoordinator] Marked ${count} interrupted job(s) as failed`);
    }
    return count;
  }

  /** Stops accepting work, cancels queued jobs and waits for running ones. */
  async close(): Promise<void> {
    this.closed = true;
    const queued = this.queue.splice(0);
    for (const jobId of queued) {
      await this.fail(jobId, new CancelledError("Job was cancelled by a service shutdown"));
    }
    await Promise.all([...this.active.values()].map((active) => active.done));
    this.checkIdle();
  }

  private reserveSlot(): void {
    if (this.closed) {
      throw new ServiceUnavailableError("Service is shutting down");
    }
    if (this.queue.length + this.reserved >= this.queueCapacity) {
      throw new QueueFullError(this.queueCapacity);
    }
    this.reserved++;
  }

  private async enqueue(data: NewJob): Promise<Job> {
    const job = await this.jobs.create(data);
    this.queue.push(job.id);
    console.log(
      `[JobCoordinator] Queued job ${job.id} (artifact ${job.artifact.hash.slice(0, 12)}, ${job.artifact.size} bytes)`,
    );
    return job;
  }

  private pump(): void {
    while (this.queue.length > 0) {
      const release = this.slots.tryAcquire();
      if (!release) return;
      const jobId = this.queue.shift();
      if (jobId === undefined) {
        release();
        return;
      }
      this.dispatch(jobId, release);
    }
    this.checkIdle();
  }

  private dispatch(jobId: string, release: () => void): void {
    const controller = new AbortController();
    const active: ActiveJob = { controller, done: Promise.resolve(), committed: false };
    active.done = this.execute(jobId, active)
      .catch((err: unknown) => {
        console.error(`[JobCoordinator] Job ${jobId} could not be finalised:`, err);
      })
      .finally(() => {
        this.active.delete(jobId);
        release();
        this.pump();
      });
    this.active.set(jobId, active);
  }

  private async execute(jobId: string, active: ActiveJob): Promise<void> {
    const { controller } = active;
    const timer = setTimeout(
      () => controller.abort(new ExtractionTimeoutError(this.jobTimeoutMs)),
      this.jobTimeoutMs,
    );
    const { signal } = controller;

    try {
      const job = await this.jobs.update(jobId, { status: "running", startedAt: this.now() });
      const started = Date.now();
      await this.pipeline.run(job, signal);
      signal.throwIfAborted();
      active.committed = true;
      clearTimeout(timer);
      await this.jobs.update(jobId, { status: "succeeded", finishedAt: this.now() });
      console.log(`[JobCoordinator] Job ${jobId} succeeded in ${Date.now() - started}ms`);
    } catch (err) {
      if (signal.aborted) {
        await this.discardResults(jobId);
        await this.fail(jobId, signal.reason);
      } else {
        await this.fail(jobId, err);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  /** An aborted job may have stored its result before the abort was seen. */
  private async discardResults(jobId: string): Promise<void> {
    try {
      await this.store.removeResults(jobId);
    } catch (err) {
      console.error(`[JobCoordinator] Could not remove results of aborted job ${jobId}: ${errorMessage(err)}`);
    }
  }

  private async fail(jobId: string, err: unknown): Promise<void> {
    const error = toJobError(err);
    const detail = error.detail ? `: ${error.detail}` : "";
    if (error.kind === "CANCELLED") {
      console.log(`[JobCoordinator] Job ${jobId} cancelled`);
    } else {
      console.error(`[JobCoordinator] Job ${jobId} failed with ${error.kind} (${error.message})${detail}`);
    }
    try {
      await this.jobs.update(jobId, { status: "failed", finishedAt: this.now(), error });
    } catch (updateErr) {
      throw new Error(`Could not record failure of job ${jobId}: ${errorMessage(updateErr)}`);
    }
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.active.size === 0 && this.reserved === 0;
  }

  private checkIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}
