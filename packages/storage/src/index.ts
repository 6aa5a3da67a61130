export * from "./artifact-store.js";
export { FsObjectStore } from "./fs-store.js";
export { KeyedLock } from "./keyed-lock.js";
export { MemoryObjectStore } from "./memory-store.js";
export { type MinioStoreConfig, MinioObjectStore } from "./minio-store.js";
export { type RetryOptions, errorCode, isTransient, withRetry } from "./retry.js";
export type { ObjectStore } from "./types.js";
