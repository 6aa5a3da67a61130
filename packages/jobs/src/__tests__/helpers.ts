import {
  type ExtractInput,
  type Extractor,
  ExtractorRegistry,
  type PdfDecoder,
  type PdfPage,
} from "@mediasift/file-extract";
import { ArtifactStore, MemoryObjectStore } from "@mediasift/storage";
import type { ExtractionResult, JobStore } from "@mediasift/utils";
import { type CoordinatorOptions, JobCoordinator } from "../coordinator.js";
import { MemoryJobStore } from "../memory-store.js";
import { ExtractionPipeline } from "../pipeline.js";

export function xmlDoc(label: string): Buffer {
  return Buffer.from(`<?xml version="1.0"?><doc>${label}</doc>`);
}

interface PendingCall {
  filename: string | null;
  finish(): void;
  fail(err: Error): void;
}

/**
 * XML extractor whose calls stay pending until the test settles them.
 * It ignores the abort signal, like a decoder stuck in native code.
 */
export class ControlledExtractor implements Extractor {
  readonly format = "xml";
  readonly name = "controlled";
  readonly version = "1";

  calls: Array<string | null> = [];
  autoFinish = false;
  private pending: PendingCall[] = [];

  async extract(input: ExtractInput): Promise<ExtractionResult> {
    this.calls.push(input.filename);
    const result: ExtractionResult = {
      format: "xml",
      extractor: { name: this.name, version: this.version },
      artifact: input.artifact.hash,
      metadata: { size: input.bytes.length },
      segments: [{ type: "text", page: null, offset: 0, path: "doc", text: input.bytes.toString("utf-8") }],
    };
    if (this.autoFinish) return result;
    return new Promise((resolve, reject) => {
      this.pending.push({ filename: input.filename, finish: () => resolve(result), fail: reject });
    });
  }

  finish(filename: string): void {
    this.take(filename).finish();
  }

  fail(filename: string, err: Error): void {
    this.take(filename).fail(err);
  }

  private take(filename: string): PendingCall {
    const index = this.pending.findIndex((call) => call.filename === filename);
    const call = this.pending[index];
    if (!call) throw new Error(`No pending extraction for ${filename}`);
    this.pending.splice(index, 1);
    return call;
  }
}

export function fakePdfDecoder(pages: Array<PdfPage | Error>): PdfDecoder {
  return {
    async open() {
      return {
        pageCount: pages.length,
        info: { title: null, author: null, producer: null },
        async readPage(pageNumber: number) {
          const page = pages[pageNumber - 1];
          if (page === undefined || page instanceof Error) throw page ?? new Error("missing page");
          return page;
        },
        async close() {},
      };
    },
  };
}

/** A promise the test opens by hand. */
export function gate() {
  let open: () => void = () => {};
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open: () => open() };
}

export interface HarnessOptions
  extends Pick<CoordinatorOptions, "queueCapacity" | "jobTimeoutMs" | "workerCount"> {
  extractors?: Extractor[];
  jobs?: JobStore;
}

export function createHarness(options: HarnessOptions = {}) {
  const { extractors = [], jobs = new MemoryJobStore(), ...coordinatorOptions } = options;
  const extractor = new ControlledExtractor();
  const registry = new ExtractorRegistry();
  registry.register(extractor);
  for (const extra of extractors) registry.register(extra);

  const objects = new MemoryObjectStore();
  const store = new ArtifactStore(objects, { retry: { delayMs: 0 } });
  const pipeline = new ExtractionPipeline({ store, registry, jobs });
  let sequence = 0;
  const coordinator = new JobCoordinator({
    jobs,
    store,
    pipeline,
    generateId: () => `job-${++sequence}`,
    ...coordinatorOptions,
  });
  return { extractor, registry, objects, store, jobs, pipeline, coordinator };
}
