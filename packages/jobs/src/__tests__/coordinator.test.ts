import { artifactKey, resultKey } from "@mediasift/storage";
import {
  ConflictError,
  type Job,
  type JobUpdate,
  NotFoundError,
  QueueFullError,
  ServiceUnavailableError,
  sha256Hex,
} from "@mediasift/utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryJobStore } from "../memory-store.js";
import { createHarness, gate, xmlDoc } from "./helpers.js";

/** Holds the update that records a success until `release` opens. */
class SlowSuccessStore extends MemoryJobStore {
  readonly entered = gate();
  readonly release = gate();

  async update(id: string, data: JobUpdate): Promise<Job> {
    if (data.status === "succeeded") {
      this.entered.open();
      await this.release.wait;
    }
    return super.update(id, data);
  }
}

const submission = (label: string) => ({ bytes: xmlDoc(label), filename: `${label}.xml`, mime: null });

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("JobCoordinator", () => {
  it("runs jobs one at a time in submission order", async () => {
    const { coordinator, extractor } = createHarness({ queueCapacity: 4 });

    const a = await coordinator.submit(submission("a"));
    const b = await coordinator.submit(submission("b"));
    const c = await coordinator.submit(submission("c"));

    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml"]));
    expect(coordinator.stats()).toEqual({
      queued: 2,
      running: 1,
      capacity: 4,
      workers: 1,
      accepting: true,
    });

    extractor.finish("a.xml");
    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml", "b.xml"]));
    extractor.finish("b.xml");
    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml", "b.xml", "c.xml"]));
    extractor.finish("c.xml");
    await coordinator.onIdle();

    for (const job of [a, b, c]) {
      expect(await coordinator.status(job.id)).toMatchObject({ status: "succeeded", format: "xml" });
    }
  });

  it("rejects submissions past the queue capacity without storing them", async () => {
    const { coordinator, extractor, store } = createHarness({ queueCapacity: 2 });

    await coordinator.submit(submission("a"));
    await coordinator.submit(submission("b"));
    await coordinator.submit(submission("c"));

    const error = await coordinator.submit(submission("d")).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(QueueFullError);
    expect(error).toMatchObject({ statusCode: 429, code: "QUEUE_FULL", capacity: 2 });
    expect(await store.has(sha256Hex(xmlDoc("d")))).toBe(false);

    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml"]));
    extractor.finish("a.xml");
    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml", "b.xml"]));
    await expect(coordinator.submit(submission("e"))).resolves.toMatchObject({ status: "queued" });
  });

  it("counts concurrent submissions against the capacity before storing", async () => {
    const { coordinator } = createHarness({ queueCapacity: 1 });
    await coordinator.submit(submission("running"));

    const results = await Promise.allSettled([
      coordinator.submit(submission("x")),
      coordinator.submit(submission("y")),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
  });

  it("cancels a queued job without reading its artifact", async () => {
    const { coordinator, extractor, store } = createHarness();
    const get = vi.spyOn(store, "get");

    const a = await coordinator.submit(submission("a"));
    const b = await coordinator.submit(submission("b"));

    expect(await coordinator.cancel(b.id)).toBe(true);
    expect(await coordinator.status(b.id)).toMatchObject({
      status: "failed",
      error: { kind: "CANCELLED", message: "Job was cancelled", detail: null, hasPartialResult: false },
    });

    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml"]));
    extractor.finish("a.xml");
    await coordinator.onIdle();

    expect(get.mock.calls.map(([ref]) => ref.hash)).toEqual([a.artifact.hash]);
    expect(extractor.calls).toEqual(["a.xml"]);
    expect(await coordinator.cancel(a.id)).toBe(false);
  });

  it("cancels a running job and moves on to the next", async () => {
    const { coordinator, extractor, store } = createHarness();

    const a = await coordinator.submit(submission("a"));
    const b = await coordinator.submit(submission("b"));
    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml"]));

    expect(await coordinator.cancel(a.id)).toBe(true);
    expect(await coordinator.status(a.id)).toMatchObject({ status: "failed", error: { kind: "CANCELLED" } });

    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml", "b.xml"]));
    extractor.finish("a.xml");
    extractor.finish("b.xml");
    await coordinator.onIdle();

    expect(await coordinator.status(b.id)).toMatchObject({ status: "succeeded" });
    expect(await store.getResult(a.id)).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(
      `[ExtractionPipeline] controlled@1 for job ${a.id} finished after the job was aborted`,
    );
  });

  it("refuses to cancel a job that is already recording its success", async () => {
    const jobs = new SlowSuccessStore();
    const { coordinator, extractor, store } = createHarness({ jobs });
    extractor.autoFinish = true;

    const job = await coordinator.submit(submission("a"));
    await jobs.entered.wait;

    const cancelling = coordinator.cancel(job.id);
    jobs.release.open();

    expect(await cancelling).toBe(false);
    expect(await coordinator.status(job.id)).toMatchObject({ status: "succeeded", error: null });
    expect(await store.getResult(job.id)).not.toBeNull();
  });

  it("removes a result stored while the job was being cancelled", async () => {
    const { coordinator, extractor, store } = createHarness();
    extractor.autoFinish = true;
    const writing = gate();
    const release = gate();
    const putResult = store.putResult.bind(store);
    vi.spyOn(store, "putResult").mockImplementation(async (jobId, result) => {
      writing.open();
      await release.wait;
      await putResult(jobId, result);
    });

    const job = await coordinator.submit(submission("a"));
    await writing.wait;

    const cancelling = coordinator.cancel(job.id);
    await new Promise((resolve) => setTimeout(resolve, 0));
    release.open();

    expect(await cancelling).toBe(true);
    expect(await coordinator.status(job.id)).toMatchObject({ status: "failed", error: { kind: "CANCELLED" } });
    expect(await store.getResult(job.id)).toBeNull();
  });

  it("times out a stuck extraction and frees the worker", async () => {
    const { coordinator, extractor } = createHarness({ jobTimeoutMs: 50 });

    const a = await coordinator.submit(submission("a"));
    const b = await coordinator.submit(submission("b"));

    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml", "b.xml"]));
    expect(await coordinator.status(a.id)).toMatchObject({
      status: "failed",
      error: { kind: "EXTRACTION_TIMEOUT", message: "Extraction exceeded 50ms" },
    });

    extractor.finish("b.xml");
    await coordinator.onIdle();
    expect(await coordinator.status(b.id)).toMatchObject({ status: "succeeded" });
  });

  it("keeps one artifact for two submissions of the same bytes", async () => {
    const { coordinator, extractor, objects } = createHarness();
    extractor.autoFinish = true;
    const write = vi.spyOn(objects, "write");

    const first = await coordinator.submit(submission("same"));
    const second = await coordinator.submit(submission("same"));
    await coordinator.onIdle();

    expect(first.id).not.toBe(second.id);
    expect(second.artifact).toEqual(first.artifact);
    expect(write.mock.calls.filter(([key]) => key.startsWith("artifacts/"))).toEqual([
      [artifactKey(first.artifact.hash), xmlDoc("same")],
    ]);
    expect(await coordinator.status(second.id)).toMatchObject({ status: "succeeded" });
    expect(extractor.calls).toHaveLength(1);
  });

  it("produces byte-identical results when an artifact is extracted again", async () => {
    const { coordinator, extractor, objects } = createHarness();
    extractor.autoFinish = true;

    const first = await coordinator.submit(submission("rerun"));
    await coordinator.onIdle();
    for (const key of await objects.list("cache/")) await objects.remove(key);

    const second = await coordinator.resubmit(first.id);
    await coordinator.onIdle();

    expect(extractor.calls).toHaveLength(2);
    const [a, b] = await Promise.all([
      objects.read(resultKey(first.id)),
      objects.read(resultKey(second.id)),
    ]);
    expect(a).not.toBeNull();
    expect(b).toEqual(a);
  });

  it("resubmits under a new id and rejects unknown jobs", async () => {
    const { coordinator, extractor } = createHarness();
    extractor.autoFinish = true;

    const original = await coordinator.submit(submission("a"));
    await coordinator.onIdle();
    const again = await coordinator.resubmit(original.id);

    expect(again.id).not.toBe(original.id);
    expect(again).toMatchObject({ artifact: original.artifact, filename: "a.xml", status: "queued" });
    await expect(coordinator.resubmit("job-404")).rejects.toBeInstanceOf(NotFoundError);
    await coordinator.onIdle();
  });

  it("purges finished jobs only", async () => {
    const { coordinator, extractor, store } = createHarness();

    const a = await coordinator.submit(submission("a"));
    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml"]));
    await expect(coordinator.purge(a.id)).rejects.toBeInstanceOf(ConflictError);

    extractor.finish("a.xml");
    await coordinator.onIdle();
    await coordinator.purge(a.id);

    await expect(coordinator.status(a.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(await store.getResult(a.id)).toBeNull();
    expect(await store.has(a.artifact.hash)).toBe(true);
  });

  it("fails jobs left behind by a previous process", async () => {
    const { coordinator, jobs } = createHarness();
    const artifact = { hash: sha256Hex(xmlDoc("old")), size: 10 };
    await jobs.create({ id: "old-queued", artifact, filename: null, declaredMime: null });
    await jobs.create({ id: "old-running", artifact, filename: null, declaredMime: null });
    await jobs.update("old-running", { status: "running" });

    expect(await coordinator.recoverInterrupted()).toBe(2);
    expect(await coordinator.status("old-running")).toMatchObject({
      status: "failed",
      error: { kind: "INTERRUPTED", message: "Job was interrupted by a service restart" },
    });
  });

  it("stops accepting work on close and lets the running job finish", async () => {
    const { coordinator, extractor } = createHarness();

    const a = await coordinator.submit(submission("a"));
    const b = await coordinator.submit(submission("b"));
    await vi.waitFor(() => expect(extractor.calls).toEqual(["a.xml"]));

    const closing = coordinator.close();
    await expect(coordinator.submit(submission("c"))).rejects.toBeInstanceOf(ServiceUnavailableError);
    extractor.finish("a.xml");
    await closing;

    expect(await coordinator.status(a.id)).toMatchObject({ status: "succeeded" });
    expect(await coordinator.status(b.id)).toMatchObject({
      status: "failed",
      error: { kind: "CANCELLED", message: "Job was cancelled by a service shutdown" },
    });
    expect(coordinator.stats()).toMatchObject({ queued: 0, running: 0, accepting: false });
  });
});
