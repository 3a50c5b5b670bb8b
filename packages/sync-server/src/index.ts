export * from "./ws-transport.js";
export * from "./server.js";
export * from "./dialer.js";
export * from "./config.js";
export * from "./node.js";
