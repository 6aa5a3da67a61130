export { closeDb, createDb, type Database } from "./client.js";
export * from "./repositories/index.js";
export * from "./schema/index.js";
