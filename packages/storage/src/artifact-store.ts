import {
  type ArtifactRef,
  type ExtractionResult,
  NotFoundError,
  StorageError,
  errorMessage,
  extractionResultSchema,
  sha256Hex,
} from "@mediasift/utils";
import { KeyedLock } from "./keyed-lock.js";
import { type RetryOptions, withRetry } from "./retry.js";
import type { ObjectStore } from "./types.js";

export interface ArtifactStoreOptions {
  retry?: RetryOptions;
}

export interface ExtractorRef {
  name: string;
  version: string;
}

export const artifactKey = (hash: string) => `artifacts/${hash.slice(0, 2)}/${hash}`;
export const resultKey = (jobId: string) => `results/${jobId}.json`;
export const partialResultKey = (jobId: string) => `results/${jobId}.partial.json`;
export const cacheKey = (hash: string, extractor: ExtractorRef) =>
  `cache/${hash}/${extractor.name}@${extractor.version}.json`;

/** Results are plain data built in a fixed key order, so this is stable across reruns. */
export function serializeResult(result: ExtractionResult): Buffer {
  return Buffer.from(JSON.stringify(result), "utf-8");
}

/**
 * Content-addressed artifacts plus per-job extraction results on top of an
 * `ObjectStore`. Writes to the same key are serialised; reads are not.
 */
export class ArtifactStore {
  private lock = new KeyedLock();
  private retry: RetryOptions;

  constructor(
    private store: ObjectStore,
    options: ArtifactStoreOptions = {},
  ) {
    this.retry = options.retry ?? {};
  }

  async put(bytes: Uint8Array): Promise<ArtifactRef> {
    const hash = sha256Hex(bytes);
    const key = artifactKey(hash);
    await this.lock.run(key, () =>
      withRetry(
        `put artifact ${hash}`,
        async () => {
          if (await this.store.exists(key)) return;
          await this.store.write(key, bytes);
        },
        this.retry,
      ),
    );
    return { hash, size: bytes.length };
  }

  async get(ref: Pick<ArtifactRef, "hash">): Promise<Buffer> {
    const bytes = await withRetry(
      `read artifact ${ref.hash}`,
      () => this.store.read(artifactKey(ref.hash)),
      this.retry,
    );
    if (!bytes) throw new NotFoundError(`Artifact ${ref.hash} not found`);

    const actual = sha256Hex(bytes);
    if (actual !== ref.hash) {
      throw new StorageError("Stored artifact is corrupt", `expected ${ref.hash}, found ${actual}`);
    }
    return bytes;
  }

  async has(hash: string): Promise<boolean> {
    return withRetry(`stat artifact ${hash}`, () => this.store.exists(artifactKey(hash)), this.retry);
  }

  async putResult(jobId: string, result: ExtractionResult): Promise<void> {
    await this.writeJson(resultKey(jobId), result);
  }

  async getResult(jobId: string): Promise<ExtractionResult | null> {
    return this.readJson(resultKey(jobId));
  }

  async putPartialResult(jobId: string, result: ExtractionResult): Promise<void> {
    await this.writeJson(partialResultKey(jobId), result);
  }

  async getPartialResult(jobId: string): Promise<ExtractionResult | null> {
    return this.readJson(partialResultKey(jobId));
  }

  async getCachedResult(hash: string, extractor: ExtractorRef): Promise<ExtractionResult | null> {
    return this.readJson(cacheKey(hash, extractor));
  }

  async putCachedResult(result: ExtractionResult): Promise<void> {
    await this.writeJson(cacheKey(result.artifact, result.extractor), result);
  }

  /** Drops a job's result and partial result. Artifacts stay: other jobs may share them. */
  async removeResults(jobId: string): Promise<void> {
    for (const key of [resultKey(jobId), partialResultKey(jobId)]) {
      await this.lock.run(key, () => withRetry(`remove ${key}`, () => this.store.remove(key), this.retry));
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.store.ping();
      return true;
    } catch (err) {
      console.warn(`[ArtifactStore] Storage unreachable: ${errorMessage(err)}`);
      return false;
    }
  }

  private async writeJson(key: string, result: ExtractionResult): Promise<void> {
    const bytes = serializeResult(result);
    await this.lock.run(key, () => withRetry(`write ${key}`, () => this.store.write(key, bytes), this.retry));
  }

  private async readJson(key: string): Promise<ExtractionResult | null> {
    const bytes = await withRetry(`read ${key}`, () => this.store.read(key), this.retry);
    if (!bytes) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(bytes.toString("utf-8"));
    } catch (err) {
      throw new StorageError(`Stored result ${key} is unreadable`, errorMessage(err));
    }
    const result = extractionResultSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(`Stored result ${key} is unreadable`, result.error.message);
    }
    return result.data;
  }
}
