/**
 * Schema metadata the store cannot use, or a value/op that does not fit the
 * field it targets. Never retried.
 */
export class SchemaError extends Error {
  readonly code = "SCHEMA";
  readonly recoverable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchemaError";
  }
}

export class DocumentNotFoundError extends Error {
  readonly code = "DOCUMENT_NOT_FOUND";
  readonly recoverable = false;

  constructor(readonly key: string) {
    super(`document not found: ${key}`);
    this.name = "DocumentNotFoundError";
  }
}

/** A transaction body threw; nothing it staged was applied. */
export class TransactionAbortedError extends Error {
  readonly code = "TRANSACTION_ABORTED";
  readonly recoverable = true;

  constructor(cause: unknown) {
    super(`transaction aborted: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "TransactionAbortedError";
  }
}

/** Stored bytes for one document failed validation. Fatal for that document only. */
export class DeserializeCorruptionError extends Error {
  readonly code = "DESERIALIZE_CORRUPTION";
  readonly recoverable = false;

  constructor(
    readonly key: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`corrupted document ${key}: ${message}`, options);
    this.name = "DeserializeCorruptionError";
  }
}
