import { PdfExtractor } from "@mediasift/file-extract";
import { artifactKey } from "@mediasift/storage";
import { CancelledError, StorageError } from "@mediasift/utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { raceAbort } from "../pipeline.js";
import { createHarness, fakePdfDecoder, xmlDoc } from "./helpers.js";

const pdfBytes = Buffer.from("%PDF-1.7\n% three page report");

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("extraction through the coordinator", () => {
  it("extracts a three page PDF into three ordered text segments", async () => {
    const decoder = fakePdfDecoder([
      { text: "Page one", images: [] },
      { text: "Page two", images: [] },
      { text: "Page three", images: [] },
    ]);
    const { coordinator, store } = createHarness({ extractors: [new PdfExtractor({ decoder })] });

    const job = await coordinator.submit({ bytes: pdfBytes, filename: "report.pdf", mime: "application/pdf" });
    await coordinator.onIdle();

    expect(await coordinator.status(job.id)).toMatchObject({ status: "succeeded", format: "pdf", error: null });
    const result = await store.getResult(job.id);
    expect(result?.segments).toEqual([
      { type: "text", page: 1, offset: 0, path: null, text: "Page one" },
      { type: "text", page: 2, offset: 9, path: null, text: "Page two" },
      { type: "text", page: 3, offset: 18, path: null, text: "Page three" },
    ]);
  });

  it("fails random bytes named .pdf as an unsupported format", async () => {
    const { coordinator, store } = createHarness({
      extractors: [new PdfExtractor({ decoder: fakePdfDecoder([]) })],
    });

    const job = await coordinator.submit({
      bytes: Buffer.from([0x13, 0x37, 0x00, 0x42, 0x99, 0x10, 0x2e, 0x7f, 0x00, 0x01, 0xc3]),
      filename: "invoice.pdf",
      mime: "application/pdf",
    });
    await coordinator.onIdle();

    expect(await coordinator.status(job.id)).toMatchObject({
      status: "failed",
      format: "unknown",
      error: {
        kind: "UNSUPPORTED_FORMAT",
        message: 'Could not recognise the format of "invoice.pdf"',
        hasPartialResult: false,
      },
    });
    expect(await store.getResult(job.id)).toBeNull();
  });

  it("keeps a partial result apart from the job result", async () => {
    const decoder = fakePdfDecoder([
      { text: "Page one", images: [] },
      { text: "Page two", images: [] },
      new Error("Unexpected end of stream"),
    ]);
    const { coordinator, store } = createHarness({ extractors: [new PdfExtractor({ decoder })] });

    const job = await coordinator.submit({ bytes: pdfBytes, filename: null, mime: null });
    await coordinator.onIdle();

    expect(await coordinator.status(job.id)).toMatchObject({
      status: "failed",
      error: {
        kind: "EXTRACTION_FAILED",
        message: "Failed to decode page 3 of 3",
        detail: "Unexpected end of stream",
        hasPartialResult: true,
      },
    });
    expect(await store.getResult(job.id)).toBeNull();
    expect((await store.getPartialResult(job.id))?.segments).toHaveLength(2);
  });
});

describe("ExtractionPipeline", () => {
  it("reuses the cached result for the same artifact and extractor version", async () => {
    const { pipeline, jobs, store, extractor } = createHarness();
    extractor.autoFinish = true;
    const artifact = await store.put(xmlDoc("cached"));
    const first = await jobs.create({ id: "first", artifact, filename: null, declaredMime: null });
    const second = await jobs.create({ id: "second", artifact, filename: null, declaredMime: null });

    const signal = new AbortController().signal;
    const a = await pipeline.run(first, signal);
    const b = await pipeline.run(second, signal);

    expect(b).toEqual(a);
    expect(extractor.calls).toHaveLength(1);
    expect(await store.getResult("second")).toEqual(a);
    expect(await jobs.get("second")).toMatchObject({ format: "xml" });
  });

  it("fails with a storage error when the artifact no longer matches its hash", async () => {
    const { pipeline, jobs, store, objects } = createHarness();
    const artifact = await store.put(xmlDoc("original"));
    await objects.write(artifactKey(artifact.hash), xmlDoc("tampered"));
    const job = await jobs.create({ id: "job", artifact, filename: null, declaredMime: null });

    await expect(pipeline.run(job, new AbortController().signal)).rejects.toBeInstanceOf(StorageError);
  });

  it("does not touch storage for an already aborted job", async () => {
    const { pipeline, jobs, store } = createHarness();
    const get = vi.spyOn(store, "get");
    const artifact = await store.put(xmlDoc("a"));
    const job = await jobs.create({ id: "job", artifact, filename: null, declaredMime: null });
    const controller = new AbortController();
    controller.abort(new CancelledError());

    await expect(pipeline.run(job, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(get).not.toHaveBeenCalled();
  });
});

describe("raceAbort", () => {
  it("rejects with the abort reason while the work is still pending", async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<string>(() => {}), controller.signal, "stuck decoder");
    const reason = new CancelledError();

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it("logs work that fails after being abandoned", async () => {
    const controller = new AbortController();
    let fail: (err: Error) => void = () => {};
    const work = new Promise<string>((_resolve, reject) => {
      fail = reject;
    });
    const raced = raceAbort(work, controller.signal, "pdf@1 for job j1");

    controller.abort(new CancelledError());
    await expect(raced).rejects.toBeInstanceOf(CancelledError);
    fail(new Error("decoder crashed"));
    await work.catch(() => undefined);

    expect(console.warn).toHaveBeenCalledWith(
      "[ExtractionPipeline] pdf@1 for job j1 failed (decoder crashed) after the job was aborted",
    );
  });

  it("passes through results when nothing aborts", async () => {
    await expect(raceAbort(Promise.resolve(42), new AbortController().signal, "x")).resolves.toBe(42);
  });
});
