import {
  InvalidValueError,
  expectArray,
  expectClock,
  expectRecord,
  expectString,
  isCrdtStrategy,
  parseFieldOp,
} from "@tidepool/crdt";

import { SchemaError } from "./errors.js";
import type { CompiledSchema } from "./schema.js";
import type { Delta, DeltaOp, DocumentRef, StateVector } from "./types.js";

export function parseRef(raw: unknown, what = "ref"): DocumentRef {
  const rec = expectRecord(raw, what);
  const namespace = expectString(rec.namespace, `${what}.namespace`);
  const id = expectString(rec.id, `${what}.id`);
  if (namespace.length === 0 || namespace.includes("/") || id.length === 0) {
    throw new InvalidValueError(`${what} is not a valid document reference`);
  }
  return { namespace, id };
}

export function parseStateVector(raw: unknown, what = "stateVector"): StateVector {
  const rec = expectRecord(raw, what);
  const out: StateVector = {};
  for (const [actor, seq] of Object.entries(rec)) out[actor] = expectClock(seq, `${what}.${actor}`);
  return out;
}

/**
 * Checks the shape of a delta decoded from the wire or from disk. Every op
 * must name a known strategy and match that strategy's op shape; whether the
 * strategy fits the field is checked by `checkDeltaSchema`.
 */
export function parseDelta(raw: unknown, what = "delta"): Delta {
  const rec = expectRecord(raw, what);
  const seq = expectClock(rec.seq, `${what}.seq`);
  if (seq < 1) throw new InvalidValueError(`${what}.seq must start at 1`);
  const ops = expectArray(rec.ops, `${what}.ops`).map((rawOp, i): DeltaOp => {
    const where = `${what}.ops[${i}]`;
    const opRec = expectRecord(rawOp, where);
    const path = expectString(opRec.path, `${where}.path`);
    const strategy = opRec.strategy;
    if (!isCrdtStrategy(strategy)) {
      throw new InvalidValueError(`${where} has unknown strategy ${JSON.stringify(strategy)}`);
    }
    return { ...parseFieldOp(strategy, opRec.op, `${where}.op`), path };
  });
  return {
    ref: parseRef(rec.ref, `${what}.ref`),
    actor: expectString(rec.actor, `${what}.actor`),
    seq,
    clock: expectClock(rec.clock, `${what}.clock`),
    ops,
  };
}

export function checkDeltaSchema(delta: Delta, schema: CompiledSchema): void {
  for (const op of delta.ops) {
    const field = schema.field(op.path);
    if (!field) throw new SchemaError(`${schema.namespace}: delta targets unknown field ${op.path}`);
    if (field.strategy !== op.strategy) {
      throw new SchemaError(
        `${schema.namespace}.${op.path}: delta carries a ${op.strategy} op for a ${field.strategy} field`,
      );
    }
  }
}
