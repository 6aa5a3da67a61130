import * as Minio from "minio";
import { errorCode } from "./retry.js";
import type { ObjectStore } from "./types.js";

export interface MinioStoreConfig {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
}

const MISSING_CODES = new Set(["NoSuchKey", "NotFound"]);

/** Object store on a MinIO/S3 bucket. Single-object puts are atomic there. */
export class MinioObjectStore implements ObjectStore {
  private client: Minio.Client;
  private bucket: string;

  constructor(config: MinioStoreConfig) {
    this.client = new Minio.Client({
      endPoint: config.endPoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
    });
    this.bucket = config.bucket;
  }

  async ensureBucket(): Promise<void> {
    const exists = await this.client.bucketExists(this.bucket);
    if (!exists) {
      await this.client.makeBucket(this.bucket);
    }
  }

  async read(key: string): Promise<Buffer | null> {
    try {
      const stream = await this.client.getObject(this.bucket, key);
      const chunks: Buffer[] = [];
      for await (const chunk of stream) {
        chunks.push(Buffer.from(chunk));
      }
      return Buffer.concat(chunks);
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async write(key: string, bytes: Uint8Array): Promise<void> {
    const buffer = Buffer.from(bytes);
    await this.client.putObject(this.bucket, key, buffer, buffer.length, {
      "Content-Type": "application/octet-stream",
    });
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.statObject(this.bucket, key);
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async remove(key: string): Promise<boolean> {
    if (!(await this.exists(key))) return false;
    await this.client.removeObject(this.bucket, key);
    return true;
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    for await (const obj of this.client.listObjects(this.bucket, prefix, true)) {
      if ("name" in obj && typeof obj.name === "string") keys.push(obj.name);
    }
    return keys.sort();
  }

  async ping(): Promise<void> {
    const exists = await this.client.bucketExists(this.bucket);
    if (!exists) {
      throw new Error(`Bucket "${this.bucket}" does not exist`);
    }
  }
}

function isMissing(err: unknown): boolean {
  const code = errorCode(err);
  return code !== null && MISSING_CODES.has(code);
}
