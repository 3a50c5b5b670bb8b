export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./context.js";
export * from "./schema.js";
export * from "./delta.js";
export { StoredDocument, getPath } from "./document.js";
export * from "./serialize.js";
export * from "./persistence.js";
export * from "./sqlite.js";
export { Transaction, overlay } from "./transaction.js";
export type { Mutator, StagedDocument } from "./transaction.js";
export * from "./store.js";
