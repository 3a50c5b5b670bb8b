export * from "./errors.js";
export * from "./schemas.js";
export * from "./model.js";
export * from "./ledger.js";
export * from "./admission.js";
export * from "./ed25519.js";
export * from "./committee.js";
export * from "./reconcile.js";
export * from "./scheduler.js";
