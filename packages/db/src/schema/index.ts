export * from "./enums.js";
export * from "./jobs.js";
