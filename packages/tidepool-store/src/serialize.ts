import { blake3 } from "@noble/hashes/blake3";

import type { FieldState } from "@tidepool/crdt";
import {
  compareBytes,
  decodeCanonical,
  encodeCanonical,
  expectArray,
  expectClock,
  expectRecord,
  expectString,
  isCrdtStrategy,
  parseFieldState,
} from "@tidepool/crdt";

import { checkDeltaSchema, parseDelta, parseStateVector } from "./delta.js";
import { StoredDocument } from "./document.js";
import { DeserializeCorruptionError } from "./errors.js";
import type { SchemaRegistry } from "./schema.js";
import type { Delta, DocumentRef, StateVector } from "./types.js";
import { docKey, refsEqual } from "./types.js";

export const ENVELOPE_VERSION = 1;

type Snapshot = {
  fields: Record<string, FieldState>;
  vector: StateVector;
  base: StateVector;
  clock: number;
};

type EnvelopeBody = {
  v: number;
  namespace: string;
  id: string;
  schemaVersion: number;
  snapshot: Snapshot;
  log: Delta[];
};

function checksum(body: EnvelopeBody): Uint8Array {
  return blake3(encodeCanonical(body));
}

/**
 * Snapshot of the merged field states plus the delta log. Replaying the log
 * over the snapshot is idempotent, so loading reproduces the same view.
 */
export function serializeDocument(doc: StoredDocument): Uint8Array {
  const fields: Record<string, FieldState> = {};
  for (const [path, state] of doc.fields) fields[path] = state;
  const body: EnvelopeBody = {
    v: ENVELOPE_VERSION,
    namespace: doc.ref.namespace,
    id: doc.ref.id,
    schemaVersion: doc.schemaVersion,
    snapshot: { fields, vector: doc.vector, base: doc.base, clock: doc.maxClock },
    log: doc.deltas(),
  };
  return encodeCanonical({ ...body, checksum: checksum(body) });
}

export function deserializeDocument(bytes: Uint8Array, schemas: SchemaRegistry, key = "document"): StoredDocument {
  let decoded: unknown;
  try {
    decoded = decodeCanonical(bytes);
  } catch (err) {
    throw new DeserializeCorruptionError(key, "not valid CBOR", { cause: err });
  }

  try {
    const rec = expectRecord(decoded, "envelope");
    if (rec.v !== ENVELOPE_VERSION) throw new Error(`unsupported envelope version ${String(rec.v)}`);
    const ref: DocumentRef = {
      namespace: expectString(rec.namespace, "namespace"),
      id: expectString(rec.id, "id"),
    };
    const schemaVersion = expectClock(rec.schemaVersion, "schemaVersion");
    const snapRec = expectRecord(rec.snapshot, "snapshot");
    const fieldsRec = expectRecord(snapRec.fields, "snapshot.fields");
    const vector = parseStateVector(snapRec.vector, "snapshot.vector");
    const base = parseStateVector(snapRec.base, "snapshot.base");
    const clock = expectClock(snapRec.clock, "snapshot.clock");
    const log = expectArray(rec.log, "log").map((d, i) => parseDelta(d, `log[${i}]`));

    const schema = schemas.get(ref.namespace);
    if (!schema) throw new Error(`no schema registered for namespace ${ref.namespace}`);

    const fields: Record<string, FieldState> = {};
    for (const [path, rawField] of Object.entries(fieldsRec)) {
      const field = schema.field(path);
      if (!field) throw new Error(`snapshot holds unknown field ${path}`);
      const fieldRec = expectRecord(rawField, `snapshot.fields.${path}`);
      const strategy = fieldRec.strategy;
      if (!isCrdtStrategy(strategy) || strategy !== field.strategy) {
        throw new Error(`snapshot field ${path} has strategy ${String(strategy)}, schema says ${field.strategy}`);
      }
      fields[path] = parseFieldState(strategy, fieldRec.state, `snapshot.fields.${path}.state`);
    }

    const body: EnvelopeBody = {
      v: ENVELOPE_VERSION,
      namespace: ref.namespace,
      id: ref.id,
      schemaVersion,
      snapshot: { fields, vector, base, clock },
      log,
    };
    if (!(rec.checksum instanceof Uint8Array) || compareBytes(rec.checksum, checksum(body)) !== 0) {
      throw new Error("checksum mismatch");
    }

    const doc = new StoredDocument(ref, schemaVersion);
    for (const [path, state] of Object.entries(fields)) doc.fields.set(path, state);
    doc.base = base;
    doc.maxClock = clock;
    for (const delta of log) {
      if (!refsEqual(delta.ref, ref)) throw new Error(`log delta belongs to ${docKey(delta.ref)}`);
      checkDeltaSchema(delta, schema);
      doc.applyOps(delta, schema);
      doc.record(delta);
    }
    doc.reindex();
    for (const [actor, seq] of Object.entries(vector)) {
      if ((doc.vector[actor] ?? 0) !== seq) throw new Error(`state vector disagrees with the log for ${actor}`);
    }
    return doc;
  } catch (err) {
    if (err instanceof DeserializeCorruptionError) throw err;
    throw new DeserializeCorruptionError(key, err instanceof Error ? err.message : String(err), { cause: err });
  }
}
