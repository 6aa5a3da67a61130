export {
  type CoordinatorOptions,
  type CoordinatorStats,
  JobCoordinator,
  type SubmitInput,
} from "./coordinator.js";
export { MemoryJobStore } from "./memory-store.js";
export { ExtractionPipeline, type PipelineDeps, raceAbort } from "./pipeline.js";
export { WorkerSlots } from "./worker-slots.js";
