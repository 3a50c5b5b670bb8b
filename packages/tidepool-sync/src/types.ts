import type { Delta, DocumentRef, StateVector } from "@tidepool/store";

export const SYNC_PROTOCOL_VERSION = 1;

export type Handshake = {
  nodeId: string;
  /** Per document key, the per-actor highest contiguous seq held. */
  stateVector: Record<string, StateVector>;
};

export type DeltaBatch = {
  ref: DocumentRef;
  deltas: Delta[];
};

export type Ack = {
  ref: DocumentRef;
  /** Receiver's state vector for the document after applying the batch. */
  upTo: StateVector;
};

/** Whole serialized document, sent when compaction dropped deltas the peer needs. */
export type Snapshot = {
  ref: DocumentRef;
  bytes: Uint8Array;
};

export type Heartbeat = {
  ts: number;
};

export type SyncErrorCode = "PROTOCOL_VIOLATION" | "INTERNAL";

export type SyncError = {
  code: SyncErrorCode;
  message: string;
};

export type SyncMessagePayload =
  | { case: "handshake"; value: Handshake }
  | { case: "deltaBatch"; value: DeltaBatch }
  | { case: "ack"; value: Ack }
  | { case: "snapshot"; value: Snapshot }
  | { case: "heartbeat"; value: Heartbeat }
  | { case: "error"; value: SyncError };

export type SyncMessage = {
  v: typeof SYNC_PROTOCOL_VERSION;
  payload: SyncMessagePayload;
};
