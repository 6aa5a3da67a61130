import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FsObjectStore } from "../fs-store.js";

describe("FsObjectStore", () => {
  let root: string;
  let store: FsObjectStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "mediasift-store-"));
    store = new FsObjectStore(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes, reads and removes objects under nested keys", async () => {
    await store.write("results/job-1.json", Buffer.from("{}"));

    expect(await store.exists("results/job-1.json")).toBe(true);
    expect((await store.read("results/job-1.json"))?.toString()).toBe("{}");
    expect(await store.remove("results/job-1.json")).toBe(true);
    expect(await store.remove("results/job-1.json")).toBe(false);
    expect(await store.read("results/job-1.json")).toBeNull();
  });

  it("replaces objects without leaving temp files behind", async () => {
    await store.write("a/b", Buffer.from("first"));
    await store.write("a/b", Buffer.from("second"));

    expect((await store.read("a/b"))?.toString()).toBe("second");
    expect(await readdir(join(root, "a"))).toEqual(["b"]);
  });

  it("lists keys by prefix in sorted order", async () => {
    await store.write("results/b.json", Buffer.from("1"));
    await store.write("results/a.partial.json", Buffer.from("2"));
    await store.write("results/a.json", Buffer.from("3"));
    await store.write("cache/x/pdf@1.json", Buffer.from("4"));

    expect(await store.list("results/a")).toEqual(["results/a.json", "results/a.partial.json"]);
    expect(await store.list("cache/")).toEqual(["cache/x/pdf@1.json"]);
    expect(await store.list("missing/")).toEqual([]);
  });

  it("rejects keys that escape the root", async () => {
    await expect(store.read("../outside")).rejects.toThrow('Invalid storage key "../outside"');
    await expect(store.write("/etc/passwd", Buffer.from("x"))).rejects.toThrow("Invalid storage key");
  });

  it("creates the root on ping", async () => {
    const nested = new FsObjectStore(join(root, "volume"));
    await expect(nested.ping()).resolves.toBeUndefined();
    expect(await readdir(root)).toEqual(["volume"]);
  });
});
