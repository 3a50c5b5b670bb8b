export * from "./types.js";
export * from "./errors.js";
export * from "./codec.js";
export * from "./guards.js";
export * from "./lww.js";
export * from "./immutable.js";
export * from "./or-set.js";
export * from "./pn-counter.js";
export * from "./rga.js";
export * from "./mv-register.js";
export * from "./peritext.js";
export * from "./field.js";
