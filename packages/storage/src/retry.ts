import {
  STORAGE_RETRY_ATTEMPTS,
  STORAGE_RETRY_DELAY_MS,
  StorageError,
  errorMessage,
} from "@mediasift/utils";

const TRANSIENT_CODES = new Set([
  "EAGAIN",
  "EBUSY",
  "EMFILE",
  "ENFILE",
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EPIPE",
  "EAI_AGAIN",
  "SlowDown",
  "ServiceUnavailable",
  "InternalError",
  "RequestTimeout",
]);

export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
}

/** errno code for fs errors, S3 error code for MinIO errors. */
export function errorCode(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

export function isTransient(err: unknown): boolean {
  const code = errorCode(err);
  return code !== null && TRANSIENT_CODES.has(code);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs a storage operation, retrying transient failures with linear back-off.
 * Whatever still fails is rethrown as a `StorageError`.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const attempts = options.attempts ?? STORAGE_RETRY_ATTEMPTS;
  const delayMs = options.delayMs ?? STORAGE_RETRY_DELAY_MS;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      const transient = isTransient(err);
      if (transient && attempt < attempts) {
        console.warn(
          `[Storage] ${operation} failed (attempt ${attempt}/${attempts}), retrying: ${errorMessage(err)}`,
        );
        await sleep(delayMs * attempt);
        continue;
      }
      const code = errorCode(err);
      throw new StorageError(
        `Storage operation failed: ${operation}`,
        code ? `${code}: ${errorMessage(err)}` : errorMessage(err),
        transient,
      );
    }
  }
}
