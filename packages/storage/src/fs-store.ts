import { randomUUID } from "node:crypto";
import type { Dirent } from "node:fs";
import { access, constants, mkdir, open, readFile, readdir, rename, rm } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { errorMessage } from "@mediasift/utils";
import { errorCode } from "./retry.js";
import type { ObjectStore } from "./types.js";

const TEMP_SUFFIX = ".tmp";

/** Object store on a mounted volume. Writes land via temp file, fsync and rename. */
export class FsObjectStore implements ObjectStore {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  private pathOf(key: string): string {
    if (key.length === 0 || key.startsWith("/") || key.split("/").includes("..")) {
      throw new Error(`Invalid storage key "${key}"`);
    }
    return join(this.root, ...key.split("/"));
  }

  async read(key: string): Promise<Buffer | null> {
    try {
      return await readFile(this.pathOf(key));
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  async write(key: string, bytes: Uint8Array): Promise<void> {
    const target = this.pathOf(key);
    await mkdir(dirname(target), { recursive: true });

    const temp = `${target}.${randomUUID()}${TEMP_SUFFIX}`;
    try {
      const handle = await open(temp, "wx");
      try {
        await handle.writeFile(bytes);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true }).catch((cleanupErr: unknown) => {
        console.warn(`[FsObjectStore] Failed to remove ${temp}: ${errorMessage(cleanupErr)}`);
      });
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.pathOf(key));
      return true;
    } catch (err) {
      if (errorCode(err) === "ENOENT") return false;
      throw err;
    }
  }

  async remove(key: string): Promise<boolean> {
    try {
      await rm(this.pathOf(key));
      return true;
    } catch (err) {
      if (errorCode(err) === "ENOENT") return false;
      throw err;
    }
  }

  async list(prefix: string): Promise<string[]> {
    const base = prefix.slice(0, prefix.lastIndexOf("/") + 1);
    const keys: string[] = [];
    await this.walk(base.length > 0 ? this.pathOf(base.replace(/\/$/, "")) : this.root, base, keys);
    return keys.filter((key) => key.startsWith(prefix)).sort();
  }

  private async walk(dir: string, keyPrefix: string, keys: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (errorCode(err) === "ENOENT") return;
      throw err;
    }
    for (const entry of entries) {
      if (entry.isDirectory()) {
        await this.walk(join(dir, entry.name), `${keyPrefix}${entry.name}/`, keys);
      } else if (entry.isFile() && !entry.name.endsWith(TEMP_SUFFIX)) {
        keys.push(`${keyPrefix}${entry.name}`);
      }
    }
  }

  async ping(): Promise<void> {
    await mkdir(this.root, { recursive: true });
    await access(this.root, constants.R_OK | constants.W_OK);
  }
}
