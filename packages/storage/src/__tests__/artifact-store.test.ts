import { type ExtractionResult, NotFoundError, StorageError, sha256Hex } from "@mediasift/utils";
import { describe, expect, it, vi } from "vitest";
import { ArtifactStore, artifactKey, serializeResult } from "../artifact-store.js";
import { withRetry } from "../retry.js";
import { MemoryObjectStore } from "../memory-store.js";

const bytes = Buffer.from("%PDF-1.4 sample");
const hash = sha256Hex(bytes);

const result: ExtractionResult = {
  format: "pdf",
  extractor: { name: "pdf", version: "1" },
  artifact: hash,
  metadata: { pageCount: 1, title: null },
  segments: [{ type: "text", page: 1, offset: 0, path: null, text: "Hello" }],
};

function errnoError(code: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

describe("ArtifactStore", () => {
  it("stores artifacts once per content hash", async () => {
    const backing = new MemoryObjectStore();
    const write = vi.spyOn(backing, "write");
    const store = new ArtifactStore(backing);

    const [first, second] = await Promise.all([store.put(bytes), store.put(bytes)]);

    expect(first).toEqual({ hash, size: bytes.length });
    expect(second).toEqual(first);
    expect(write).toHaveBeenCalledOnce();
    expect(write).toHaveBeenCalledWith(`artifacts/${hash.slice(0, 2)}/${hash}`, bytes);
    expect(await store.get(first)).toEqual(bytes);
  });

  it("reports missing and corrupted artifacts", async () => {
    const backing = new MemoryObjectStore();
    const store = new ArtifactStore(backing);

    await expect(store.get({ hash })).rejects.toBeInstanceOf(NotFoundError);

    await backing.write(artifactKey(hash), Buffer.from("tampered"));
    const error = await store.get({ hash }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(StorageError);
    expect(error).toHaveProperty("message", "Stored artifact is corrupt");
  });

  it("keeps results, partial results and cache entries apart", async () => {
    const backing = new MemoryObjectStore();
    const store = new ArtifactStore(backing);

    await store.putResult("job-1", result);
    await store.putPartialResult("job-2", result);
    await store.putCachedResult(result);

    expect(await backing.list("")).toEqual([
      `cache/${hash}/pdf@1.json`,
      "results/job-1.json",
      "results/job-2.partial.json",
    ]);
    expect(await store.getResult("job-1")).toEqual(result);
    expect(await store.getResult("job-2")).toBeNull();
    expect(await store.getPartialResult("job-2")).toEqual(result);
    expect(await store.getCachedResult(hash, { name: "pdf", version: "2" })).toBeNull();
    expect(await store.getCachedResult(hash, { name: "pdf", version: "1" })).toEqual(result);
  });

  it("round-trips results byte for byte", async () => {
    const backing = new MemoryObjectStore();
    const store = new ArtifactStore(backing);

    await store.putResult("job-1", result);
    const reread = await store.getResult("job-1");

    expect(reread).not.toBeNull();
    if (!reread) return;
    expect(serializeResult(reread).equals(serializeResult(result))).toBe(true);
  });

  it("rejects stored results that do not match the result shape", async () => {
    const backing = new MemoryObjectStore();
    await backing.write("results/job-1.json", Buffer.from('{"format":"pdf"}'));

    await expect(new ArtifactStore(backing).getResult("job-1")).rejects.toBeInstanceOf(StorageError);
  });

  it("removes both results of a job", async () => {
    const backing = new MemoryObjectStore();
    const store = new ArtifactStore(backing);
    await store.put(bytes);
    await store.putResult("job-1", result);
    await store.putPartialResult("job-1", result);

    await store.removeResults("job-1");

    expect(await backing.list("results/")).toEqual([]);
    expect(await store.has(hash)).toBe(true);
  });

  it("reports an unreachable backing store from ping", async () => {
    const backing = new MemoryObjectStore();
    vi.spyOn(backing, "ping").mockRejectedValue(errnoError("EACCES"));
    vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(await new ArtifactStore(backing).ping()).toBe(false);
  });
});

describe("withRetry", () => {
  it("retries transient failures until one succeeds", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(errnoError("EBUSY"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry("read", fn, { delayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("promotes exhausted transient failures to a transient StorageError", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(errnoError("EAGAIN"));

    const error = await withRetry("write", fn, { attempts: 3, delayMs: 0 }).catch((err: unknown) => err);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({
      message: "Storage operation failed: write",
      detail: "EAGAIN: EAGAIN: simulated",
      transient: true,
    });
  });

  it("fails immediately on permanent errors", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(errnoError("ENOSPC"));

    const error = await withRetry("write", fn, { delayMs: 0 }).catch((err: unknown) => err);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(error).toMatchObject({ kind: "STORAGE_ERROR", transient: false });
  });
});
