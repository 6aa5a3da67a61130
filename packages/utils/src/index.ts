export * from "./constants.js";
export * from "./errors.js";
export * from "./hash.js";
export * from "./job-state.js";
export * from "./types/api.js";
export * from "./types/extraction.js";
export * from "./types/job.js";
