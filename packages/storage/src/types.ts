/**
 * Flat key/value object storage. Keys are `/`-separated relative paths.
 * `write` must leave either the previous object or the complete new one
 * visible, never a partial write.
 */
export interface ObjectStore {
  read(key: string): Promise<Buffer | null>;
  write(key: string, bytes: Uint8Array): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Returns false when nothing was stored under `key`. */
  remove(key: string): Promise<boolean>;
  list(prefix: string): Promise<string[]>;
  /** Throws when the backing store is unreachable. */
  ping(): Promise<void>;
}
