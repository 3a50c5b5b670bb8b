export * from "./types.js";
export * from "./errors.js";
export * from "./transport.js";
export * from "./codec.js";
export * from "./discovery.js";
export * from "./network.js";
export * from "./queue.js";
export * from "./backoff.js";
export * from "./state.js";
export * from "./session.js";
export * from "./manager.js";
export { sleepUntil } from "./util.js";
