import type { JobCoordinator } from "@mediasift/jobs";
import type { ArtifactStore } from "@mediasift/storage";

export interface ApiContext {
  coordinator: JobCoordinator;
  store: ArtifactStore;
  maxUploadBytes: number;
  /** Extra reachability probes reported by `GET /status`, e.g. the database. */
  probes?: Record<string, () => Promise<boolean>>;
}
