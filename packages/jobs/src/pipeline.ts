import {
  type ExtractInput,
  type ExtractionContext,
  type ExtractorRegistry,
  assertSupported,
  classify,
} from "@mediasift/file-extract";
import type { ArtifactStore } from "@mediasift/storage";
import {
  ExtractionFailedError,
  type ExtractionResult,
  type Job,
  type JobStore,
  SNIFF_BYTES,
  errorMessage,
} from "@mediasift/utils";

export interface PipelineDeps {
  store: ArtifactStore;
  registry: ExtractorRegistry;
  jobs: JobStore;
}

/**
 * Settles with `work` unless `signal` aborts first, in which case it rejects
 * with the abort reason. The abandoned work keeps running; its outcome is logged.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal, label: string): Promise<T> {
  const abandoned = (outcome: string) =>
    console.warn(`[ExtractionPipeline] ${label} ${outcome} after the job was aborted`);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        if (signal.aborted) abandoned("finished");
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        if (signal.aborted) abandoned(`failed (${errorMessage(err)})`);
        reject(err);
      },
    );
  });
}

export class ExtractionPipeline {
  constructor(private deps: PipelineDeps) {}

  async run(job: Job, signal: AbortSignal): Promise<ExtractionResult> {
    const { store, registry, jobs } = this.deps;
    signal.throwIfAborted();

    const bytes = await store.get(job.artifact);
    signal.throwIfAborted();

    const classification = classify(bytes.subarray(0, SNIFF_BYTES), job.filename);
    await jobs.update(job.id, { format: classification.format });
    assertSupported(classification, job.filename);
    const extractor = registry.get(classification.format);

    const cached = await store.getCachedResult(job.artifact.hash, extractor);
    if (cached) {
      signal.throwIfAborted();
      await store.putResult(job.id, cached);
      return cached;
    }

    const input: ExtractInput = { bytes, artifact: job.artifact, filename: job.filename };
    const ctx: ExtractionContext = {
      signal,
      storeDerived: async (derived) => (await store.put(derived)).hash,
    };

    let result: ExtractionResult;
    try {
      result = await raceAbort(
        extractor.extract(input, ctx),
        signal,
        `${extractor.name}@${extractor.version} for job ${job.id}`,
      );
    } catch (err) {
      if (err instanceof ExtractionFailedError && err.partial) {
        throw await this.savePartial(job.id, err, err.partial);
      }
      throw err;
    }

    signal.throwIfAborted();
    await store.putResult(job.id, result);
    await store.putCachedResult(result);
    return result;
  }

  /** Returns the error to raise: the original, or one without a partial when it could not be stored. */
  private async savePartial(
    jobId: string,
    err: ExtractionFailedError,
    partial: ExtractionResult,
  ): Promise<ExtractionFailedError> {
    try {
      await this.deps.store.putPartialResult(jobId, partial);
      return err;
    } catch (storeErr) {
      console.error(
        `[ExtractionPipeline] Failed to store partial result for job ${jobId}: ${errorMessage(storeErr)}`,
      );
      return new ExtractionFailedError(err.message, err.detail);
    }
  }
}
