import { decodeCanonical, encodeCanonical, expectArray, expectNumber, expectRecord, expectString } from "@tidepool/crdt";
import { parseDelta, parseRef, parseStateVector } from "@tidepool/store";
import type { StateVector } from "@tidepool/store";

import { ProtocolViolationError } from "./errors.js";
import type { WireCodec } from "./transport.js";
import type { SyncErrorCode, SyncMessage, SyncMessagePayload } from "./types.js";
import { SYNC_PROTOCOL_VERSION } from "./types.js";

function parseErrorCode(raw: unknown): SyncErrorCode {
  if (raw === "PROTOCOL_VIOLATION" || raw === "INTERNAL") return raw;
  throw new Error(`unknown error code ${JSON.stringify(raw)}`);
}

function parsePayload(raw: unknown): SyncMessagePayload {
  const rec = expectRecord(raw, "payload");
  const value = expectRecord(rec.value, "payload.value");
  switch (rec.case) {
    case "handshake": {
      const vectors = expectRecord(value.stateVector, "handshake.stateVector");
      const stateVector: Record<string, StateVector> = {};
      for (const [key, vector] of Object.entries(vectors)) {
        stateVector[key] = parseStateVector(vector, `handshake.stateVector.${key}`);
      }
      return { case: "handshake", value: { nodeId: expectString(value.nodeId, "handshake.nodeId"), stateVector } };
    }
    case "deltaBatch":
      return {
        case: "deltaBatch",
        value: {
          ref: parseRef(value.ref, "deltaBatch.ref"),
          deltas: expectArray(value.deltas, "deltaBatch.deltas").map((d, i) => parseDelta(d, `deltaBatch.deltas[${i}]`)),
        },
      };
    case "ack":
      return {
        case: "ack",
        value: { ref: parseRef(value.ref, "ack.ref"), upTo: parseStateVector(value.upTo, "ack.upTo") },
      };
    case "snapshot": {
      if (!(value.bytes instanceof Uint8Array)) throw new Error("snapshot.bytes must be bytes");
      return { case: "snapshot", value: { ref: parseRef(value.ref, "snapshot.ref"), bytes: value.bytes } };
    }
    case "heartbeat":
      return { case: "heartbeat", value: { ts: expectNumber(value.ts, "heartbeat.ts") } };
    case "error":
      return {
        case: "error",
        value: { code: parseErrorCode(value.code), message: expectString(value.message, "error.message") },
      };
    default:
      throw new Error(`unknown message case ${JSON.stringify(rec.case)}`);
  }
}

/** Validates a decoded frame. Anything off-shape is a protocol violation. */
export function parseSyncMessage(raw: unknown): SyncMessage {
  try {
    const rec = expectRecord(raw, "message");
    if (rec.v !== SYNC_PROTOCOL_VERSION) throw new Error(`unsupported protocol version ${String(rec.v)}`);
    return { v: SYNC_PROTOCOL_VERSION, payload: parsePayload(rec.payload) };
  } catch (err) {
    throw new ProtocolViolationError(`malformed sync message: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
}

export function createCborSyncCodec(): WireCodec<SyncMessage, Uint8Array> {
  return {
    encode: (message) => encodeCanonical(message),
    decode: (wire) => {
      let raw: unknown;
      try {
        raw = decodeCanonical(wire);
      } catch (err) {
        throw new ProtocolViolationError("sync frame is not valid CBOR", { cause: err });
      }
      return parseSyncMessage(raw);
    },
  };
}
