import type { ObjectStore } from "./types.js";

/** Process-local object store, for tests and throwaway runs. */
export class MemoryObjectStore implements ObjectStore {
  private objects = new Map<string, Buffer>();

  async read(key: string): Promise<Buffer | null> {
    const bytes = this.objects.get(key);
    return bytes ? Buffer.from(bytes) : null;
  }

  async write(key: string, bytes: Uint8Array): Promise<void> {
    this.objects.set(key, Buffer.from(bytes));
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async remove(key: string): Promise<boolean> {
    return this.objects.delete(key);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  async ping(): Promise<void> {}
}
