import type { CrdtStrategy } from "./types.js";

/**
 * Two different values were written concurrently to a set-once field.
 * This is a schema violation and is never retried.
 */
export class ImmutableConflictError extends Error {
  readonly code = "IMMUTABLE_CONFLICT";
  readonly recoverable = false;

  constructor(readonly path?: string) {
    super(path ? `immutable field "${path}" was set to conflicting values` : "immutable field was set to conflicting values");
    this.name = "ImmutableConflictError";
  }
}

export class StrategyMismatchError extends Error {
  readonly code = "STRATEGY_MISMATCH";
  readonly recoverable = false;

  constructor(
    readonly expected: CrdtStrategy,
    readonly actual: string,
  ) {
    super(`expected a ${expected} field, got ${actual}`);
    this.name = "StrategyMismatchError";
  }
}

/**
 * A value or op does not have the shape its strategy requires.
 */
export class InvalidValueError extends Error {
  readonly code = "INVALID_VALUE";
  readonly recoverable = false;

  constructor(message: string) {
    super(message);
    this.name = "InvalidValueError";
  }
}
