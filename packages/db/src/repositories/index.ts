export { JobRepository } from "./jobs.js";
