import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * ffmpeg needs a seekable input for containers that keep their index at the
 * end (MP4 with a trailing moov atom), so media is spilled to a private temp dir.
 */
export async function withTempFile<T>(
  bytes: Uint8Array,
  suffix: string,
  fn: (path: string) => Promise<T>,
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "mediasift-"));
  try {
    const file = join(dir, `input${suffix}`);
    await writeFile(file, bytes);
    return await fn(file);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function extensionSuffix(filename: string | null): string {
  const match = filename?.match(/\.[A-Za-z0-9]{1,8}$/);
  return match ? match[0].toLowerCase() : "";
}
