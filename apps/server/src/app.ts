import { type ApiContext, createApiHandler } from "@mediasift/api";
import { JobRepository, closeDb, createDb } from "@mediasift/db";
import {
  DefaultPcmDecoder,
  FfmpegPcmDecoder,
  FfmpegVideoToolkit,
  createDefaultRegistry,
  ffmpegAvailable,
} from "@mediasift/file-extract";
import { ExtractionPipeline, JobCoordinator, MemoryJobStore } from "@mediasift/jobs";
import {
  ArtifactStore,
  FsObjectStore,
  MinioObjectStore,
  type ObjectStore,
} from "@mediasift/storage";
import { type JobStore, errorMessage } from "@mediasift/utils";
import { sql } from "drizzle-orm";
import type { AppConfig } from "./config.js";

export interface App {
  handler: (request: Request) => Promise<Response>;
  coordinator: JobCoordinator;
  store: ArtifactStore;
  close(): Promise<void>;
}

async function openObjectStore(config: AppConfig): Promise<ObjectStore> {
  if (config.storage.backend === "minio") {
    const store = new MinioObjectStore(config.storage.minio);
    await store.ensureBucket();
    console.log(`[Storage] Using MinIO bucket "${config.storage.minio.bucket}"`);
    return store;
  }
  const store = new FsObjectStore(config.storage.root);
  await store.ping();
  console.log(`[Storage] Using volume at ${store.root}`);
  return store;
}

export async function createApp(config: AppConfig): Promise<App> {
  const objectStore = await openObjectStore(config);
  const store = new ArtifactStore(objectStore);

  const db = config.databaseUrl ? createDb(config.databaseUrl) : null;
  const jobs: JobStore = db ? new JobRepository(db) : new MemoryJobStore();
  if (!db) {
    console.warn("[Jobs] DATABASE_URL not set; job records are kept in memory");
  }

  if (!(await ffmpegAvailable(config.ffmpeg))) {
    console.warn("[Extract] ffmpeg/ffprobe not found; video and non-WAV audio jobs will fail");
  }

  const registry = createDefaultRegistry({
    audio: {
      decoder: new DefaultPcmDecoder(new FfmpegPcmDecoder(config.ffmpeg)),
      segmentSeconds: config.audio.segmentSeconds,
    },
    video: {
      toolkit: new FfmpegVideoToolkit(config.ffmpeg),
      frameIntervalSeconds: config.video.frameIntervalSeconds,
      maxFrames: config.video.maxFrames,
    },
  });

  const coordinator = new JobCoordinator({
    jobs,
    store,
    pipeline: new ExtractionPipeline({ store, registry, jobs }),
    queueCapacity: config.queueCapacity,
    jobTimeoutMs: config.jobTimeoutMs,
    workerCount: config.workerCount,
  });
  await coordinator.recoverInterrupted();

  const ctx: ApiContext = { coordinator, store, maxUploadBytes: config.maxUploadBytes };
  if (db) {
    ctx.probes = {
      database: async () => {
        try {
          await db.execute(sql`select 1`);
          return true;
        } catch (err) {
          console.warn(`[Database] Ping failed: ${errorMessage(err)}`);
          return false;
        }
      },
    };
  }

  return {
    handler: createApiHandler(ctx),
    coordinator,
    store,
    async close() {
      await coordinator.close();
      if (db) await closeDb(db);
    },
  };
}
