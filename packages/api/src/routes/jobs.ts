import type { ArtifactStore } from "@mediasift/storage";
import {
  type Job,
  type JobView,
  ValidationError,
  jobIdSchema,
  jobListQuerySchema,
} from "@mediasift/utils";
import type { ApiContext } from "../context.js";
import { validateParam, validateQuery } from "../middleware/validate.js";

async function toView(job: Job, store: ArtifactStore, withResult: boolean): Promise<JobView> {
  const view: JobView = {
    id: job.id,
    status: job.status,
    format: job.format,
    filename: job.filename,
    artifact: job.artifact,
    enqueuedAt: job.enqueuedAt.toISOString(),
    startedAt: job.startedAt?.toISOString() ?? null,
    finishedAt: job.finishedAt?.toISOString() ?? null,
  };
  if (!withResult) {
    if (job.error) view.error = { kind: job.error.kind, message: job.error.message };
    return view;
  }

  if (job.status === "succeeded") {
    const result = await store.getResult(job.id);
    if (result) view.result = result;
  }
  if (job.error) {
    // detail stays internal
    view.error = { kind: job.error.kind, message: job.error.message };
    if (job.error.hasPartialResult) {
      const partial = await store.getPartialResult(job.id);
      if (partial) view.error.partial = partial;
    }
  }
  return view;
}

function jobId(id: string): string {
  return validateParam(id, jobIdSchema, `Job ${id} not found`);
}

async function readUpload(request: Request, maxUploadBytes: number) {
  let formData: FormData;
  try {
    formData = await request.formData();
  } catch {
    throw new ValidationError("Expected a multipart/form-data body with a file field");
  }

  const file = formData.get("file");
  if (!file || !(file instanceof File)) {
    throw new ValidationError("No file provided");
  }
  if (file.size > maxUploadBytes) {
    throw new ValidationError(`File too large (limit ${maxUploadBytes} bytes)`);
  }

  return {
    bytes: Buffer.from(await file.arrayBuffer()),
    filename: file.name || null,
    mime: file.type || null,
  };
}

export async function submitJob(request: Request, ctx: ApiContext) {
  const upload = await readUpload(request, ctx.maxUploadBytes);
  const job = await ctx.coordinator.submit(upload);
  return Response.json(
    { jobId: job.id },
    { status: 202, headers: { Location: `/jobs/${job.id}` } },
  );
}

export async function listJobs(request: Request, ctx: ApiContext) {
  const query = validateQuery(request.url, jobListQuerySchema);
  const jobs = await ctx.coordinator.list(query);
  return Response.json({
    jobs: await Promise.all(jobs.map((job) => toView(job, ctx.store, false))),
  });
}

export async function getJob(_request: Request, ctx: ApiContext, id: string) {
  const job = await ctx.coordinator.status(jobId(id));
  return Response.json(await toView(job, ctx.store, true));
}

export async function cancelJob(_request: Request, ctx: ApiContext, id: string) {
  const cancelled = await ctx.coordinator.cancel(jobId(id));
  return Response.json({ cancelled });
}

export async function resubmitJob(_request: Request, ctx: ApiContext, id: string) {
  const job = await ctx.coordinator.resubmit(jobId(id));
  return Response.json(
    { jobId: job.id },
    { status: 202, headers: { Location: `/jobs/${job.id}` } },
  );
}

export async function purgeJob(_request: Request, ctx: ApiContext, id: string) {
  await ctx.coordinator.purge(jobId(id));
  return Response.json({ ok: true });
}
