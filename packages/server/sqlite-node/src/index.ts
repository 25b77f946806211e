export { startServer } from "./server.js";
export type { ServerHandle, ServerOptions } from "./server.js";
