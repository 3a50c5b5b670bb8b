/** Dialing or sending failed in a way worth retrying. */
export class NetworkTransientError extends Error {
  readonly code = "NETWORK_TRANSIENT";
  readonly recoverable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkTransientError";
  }
}

/** The peer sent something this node must not accept. The peer is dropped and not redialed. */
export class ProtocolViolationError extends Error {
  readonly code = "PROTOCOL_VIOLATION";
  readonly recoverable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolViolationError";
  }
}
