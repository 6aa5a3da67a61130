export type { ApiContext } from "./context.js";
export { createApiHandler } from "./handler.js";
