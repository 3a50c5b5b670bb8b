import { valuesEqual } from "./codec.js";
import { InvalidValueError, StrategyMismatchError } from "./errors.js";
import {
  expectArray,
  expectClock,
  expectNumber,
  expectRecord,
  expectStamp,
  expectStampKey,
  expectString,
  expectTrueSet,
  expectValue,
  mapRecord,
} from "./guards.js";
import type { ImmutableOp, ImmutableState } from "./immutable.js";
import { diffImmutable, immutableFragment, mergeImmutable, readImmutable } from "./immutable.js";
import type { LwwOp, LwwState } from "./lww.js";
import { diffLww, lwwFragment, mergeLww, readLww } from "./lww.js";
import type { MvEntry, MvRegisterOp, MvRegisterState } from "./mv-register.js";
import {
  absorbMvRegister,
  diffMvRegister,
  emptyMvRegister,
  mvRegisterFragment,
  readMvRegister,
} from "./mv-register.js";
import type { OrSetOp, OrSetState } from "./or-set.js";
import { absorbOrSet, diffOrSet, emptyOrSet, orSetFragment, readOrSet } from "./or-set.js";
import type { PeritextMark, PeritextOp, PeritextState } from "./peritext.js";
import {
  absorbPeritext,
  diffPeritext,
  emptyPeritext,
  peritextFragment,
  peritextViewToValue,
  readPeritext,
} from "./peritext.js";
import type { PnCounterOp, PnCounterState } from "./pn-counter.js";
import { absorbPnCounter, diffPnCounter, emptyPnCounter, pnCounterFragment, readPnCounter } from "./pn-counter.js";
import type { RgaElement, RgaInsert, RgaOp, RgaState } from "./rga.js";
import { absorbRga, diffRga, emptyRga, readRga, rgaFragment } from "./rga.js";
import type { CrdtStrategy, FieldOptions, OpContext, Value } from "./types.js";

export type FieldState =
  | { strategy: "immutable"; state: ImmutableState }
  | { strategy: "lww"; state: LwwState }
  | { strategy: "or_set"; state: OrSetState }
  | { strategy: "pn_counter"; state: PnCounterState }
  | { strategy: "rga"; state: RgaState }
  | { strategy: "mv_register"; state: MvRegisterState }
  | { strategy: "peritext"; state: PeritextState };

export type FieldOp =
  | { strategy: "immutable"; op: ImmutableOp }
  | { strategy: "lww"; op: LwwOp }
  | { strategy: "or_set"; op: OrSetOp }
  | { strategy: "pn_counter"; op: PnCounterOp }
  | { strategy: "rga"; op: RgaOp }
  | { strategy: "mv_register"; op: MvRegisterOp }
  | { strategy: "peritext"; op: PeritextOp };

function unreachable(x: never): never {
  throw new Error(`unknown strategy: ${String(x)}`);
}

export function emptyField(strategy: CrdtStrategy): FieldState {
  switch (strategy) {
    case "immutable":
      return { strategy, state: null };
    case "lww":
      return { strategy, state: null };
    case "or_set":
      return { strategy, state: emptyOrSet() };
    case "pn_counter":
      return { strategy, state: emptyPnCounter() };
    case "rga":
      return { strategy, state: emptyRga() };
    case "mv_register":
      return { strategy, state: emptyMvRegister() };
    case "peritext":
      return { strategy, state: emptyPeritext() };
    default:
      return unreachable(strategy);
  }
}

export function cloneField(field: FieldState): FieldState {
  return structuredClone(field);
}

/** The single-op state an op stands for. */
export function fieldFragment(op: FieldOp): FieldState {
  switch (op.strategy) {
    case "immutable":
      return { strategy: op.strategy, state: immutableFragment(op.op) };
    case "lww":
      return { strategy: op.strategy, state: lwwFragment(op.op) };
    case "or_set":
      return { strategy: op.strategy, state: orSetFragment(op.op) };
    case "pn_counter":
      return { strategy: op.strategy, state: pnCounterFragment(op.op) };
    case "rga":
      return { strategy: op.strategy, state: rgaFragment(op.op) };
    case "mv_register":
      return { strategy: op.strategy, state: mvRegisterFragment(op.op) };
    case "peritext":
      return { strategy: op.strategy, state: peritextFragment(op.op) };
    default:
      return unreachable(op);
  }
}

/**
 * Merges `source` into `target` in place and returns `target`. Both sides must
 * carry the same strategy.
 */
export function absorbField(target: FieldState, source: FieldState, opts: FieldOptions = {}): FieldState {
  const mismatch = () => new StrategyMismatchError(target.strategy, source.strategy);
  switch (target.strategy) {
    case "immutable":
      if (source.strategy !== "immutable") throw mismatch();
      target.state = mergeImmutable(target.state, source.state, opts.path);
      return target;
    case "lww":
      if (source.strategy !== "lww") throw mismatch();
      target.state = mergeLww(target.state, source.state, opts.bound);
      return target;
    case "or_set":
      if (source.strategy !== "or_set") throw mismatch();
      absorbOrSet(target.state, structuredClone(source.state));
      return target;
    case "pn_counter":
      if (source.strategy !== "pn_counter") throw mismatch();
      absorbPnCounter(target.state, source.state);
      return target;
    case "rga":
      if (source.strategy !== "rga") throw mismatch();
      absorbRga(target.state, structuredClone(source.state));
      return target;
    case "mv_register":
      if (source.strategy !== "mv_register") throw mismatch();
      absorbMvRegister(target.state, structuredClone(source.state));
      return target;
    case "peritext":
      if (source.strategy !== "peritext") throw mismatch();
      absorbPeritext(target.state, structuredClone(source.state));
      return target;
    default:
      return unreachable(target);
  }
}

/** Pure merge: commutative, associative and idempotent for every strategy. */
export function mergeField(a: FieldState, b: FieldState, opts: FieldOptions = {}): FieldState {
  return absorbField(cloneField(a), b, opts);
}

export function applyFieldOp(state: FieldState, op: FieldOp, opts: FieldOptions = {}): FieldState {
  return absorbField(state, fieldFragment(op), opts);
}

export function readField(field: FieldState, opts: FieldOptions = {}): Value {
  switch (field.strategy) {
    case "immutable":
      return readImmutable(field.state);
    case "lww":
      return readLww(field.state);
    case "or_set":
      return readOrSet(field.state);
    case "pn_counter":
      return readPnCounter(field.state, opts.bound);
    case "rga":
      return readRga(field.state);
    case "mv_register":
      return readMvRegister(field.state);
    case "peritext":
      return peritextViewToValue(readPeritext(field.state));
    default:
      return unreachable(field);
  }
}

/**
 * Ops that turn the field's current view into `next`. No ops when the view
 * already equals `next`.
 */
export function diffField(field: FieldState, next: Value, ctx: OpContext, opts: FieldOptions = {}): FieldOp[] {
  if (valuesEqual(readField(field, opts), next)) return [];
  switch (field.strategy) {
    case "immutable":
      return diffImmutable(field.state, next, ctx, opts.path).map((op): FieldOp => ({ strategy: "immutable", op }));
    case "lww":
      return diffLww(field.state, next, ctx, opts.bound).map((op): FieldOp => ({ strategy: "lww", op }));
    case "or_set":
      return diffOrSet(field.state, next, ctx).map((op): FieldOp => ({ strategy: "or_set", op }));
    case "pn_counter":
      return diffPnCounter(field.state, next, ctx, opts.bound).map((op): FieldOp => ({ strategy: "pn_counter", op }));
    case "rga":
      return diffRga(field.state, next, ctx).map((op): FieldOp => ({ strategy: "rga", op }));
    case "mv_register":
      return diffMvRegister(field.state, next, ctx).map((op): FieldOp => ({ strategy: "mv_register", op }));
    case "peritext":
      return diffPeritext(field.state, next, ctx).map((op): FieldOp => ({ strategy: "peritext", op }));
    default:
      return unreachable(field);
  }
}

function parseRgaInsert(raw: unknown, what: string): RgaInsert {
  const rec = expectRecord(raw, what);
  return {
    id: expectStampKey(rec.id, `${what}.id`),
    left: rec.left === null ? null : expectStampKey(rec.left, `${what}.left`),
    value: expectValue(rec.value, `${what}.value`),
  };
}

function parseIds(raw: unknown, what: string): string[] {
  return expectArray(raw, what).map((id, i) => expectStampKey(id, `${what}[${i}]`));
}

function parseRgaOp(rec: Record<string, unknown>, what: string): RgaOp {
  if (rec.type === "insert") {
    return {
      type: "insert",
      elements: expectArray(rec.elements, `${what}.elements`).map((e, i) =>
        parseRgaInsert(e, `${what}.elements[${i}]`),
      ),
    };
  }
  if (rec.type === "delete") return { type: "delete", ids: parseIds(rec.ids, `${what}.ids`) };
  throw new InvalidValueError(`${what} has unknown type ${String(rec.type)}`);
}

function parseMvEntry(raw: unknown, what: string): MvEntry {
  const rec = expectRecord(raw, what);
  return {
    value: expectValue(rec.value, `${what}.value`),
    dot: expectStamp(rec.dot, `${what}.dot`),
    seen: mapRecord(rec.seen, `${what}.seen`, (v, k) => expectClock(v, `${what}.seen.${k}`)),
  };
}

function parseSetOp(rec: Record<string, unknown>, what: string): { type: "set"; value: Value; stamp: { clock: number; actor: string } } {
  if (rec.type !== "set") throw new InvalidValueError(`${what} has unknown type ${String(rec.type)}`);
  return { type: "set", value: expectValue(rec.value, `${what}.value`), stamp: expectStamp(rec.stamp, `${what}.stamp`) };
}

/**
 * Validates an op received from a peer against the strategy the schema
 * declares for its field.
 */
export function parseFieldOp(strategy: CrdtStrategy, raw: unknown, what = "op"): FieldOp {
  const rec = expectRecord(raw, what);
  switch (strategy) {
    case "immutable":
      return { strategy, op: parseSetOp(rec, what) };
    case "lww":
      return { strategy, op: parseSetOp(rec, what) };
    case "or_set":
      if (rec.type === "add") {
        return {
          strategy,
          op: { type: "add", tag: expectString(rec.tag, `${what}.tag`), value: expectValue(rec.value, `${what}.value`) },
        };
      }
      if (rec.type === "remove") {
        return {
          strategy,
          op: {
            type: "remove",
            tags: expectArray(rec.tags, `${what}.tags`).map((t, i) => expectString(t, `${what}.tags[${i}]`)),
          },
        };
      }
      throw new InvalidValueError(`${what} has unknown type ${String(rec.type)}`);
    case "pn_counter": {
      if (rec.type !== "accumulate") throw new InvalidValueError(`${what} has unknown type ${String(rec.type)}`);
      const inc = expectNumber(rec.inc, `${what}.inc`);
      const dec = expectNumber(rec.dec, `${what}.dec`);
      if (inc < 0 || dec < 0) throw new InvalidValueError(`${what} accumulators must be non-negative`);
      return { strategy, op: { type: "accumulate", actor: expectString(rec.actor, `${what}.actor`), inc, dec } };
    }
    case "rga":
      return { strategy, op: parseRgaOp(rec, what) };
    case "mv_register":
      if (rec.type !== "write") throw new InvalidValueError(`${what} has unknown type ${String(rec.type)}`);
      return { strategy, op: { type: "write", entry: parseMvEntry(rec.entry, `${what}.entry`) } };
    case "peritext":
      if (rec.type === "mark") {
        return {
          strategy,
          op: {
            type: "mark",
            id: expectStampKey(rec.id, `${what}.id`),
            markType: expectString(rec.markType, `${what}.markType`),
            value: expectValue(rec.value, `${what}.value`),
            start: expectStampKey(rec.start, `${what}.start`),
            end: expectStampKey(rec.end, `${what}.end`),
          },
        };
      }
      return { strategy, op: parseRgaOp(rec, what) };
    default:
      return unreachable(strategy);
  }
}

function parseRgaState(raw: unknown, what: string): RgaState {
  const rec = expectRecord(raw, what);
  return {
    elements: mapRecord(rec.elements, `${what}.elements`, (v, id): RgaElement => {
      expectStampKey(id, `${what}.elements key`);
      const el = expectRecord(v, `${what}.elements.${id}`);
      return {
        left: el.left === null ? null : expectStampKey(el.left, `${what}.elements.${id}.left`),
        value: expectValue(el.value, `${what}.elements.${id}.value`),
      };
    }),
    deleted: expectTrueSet(rec.deleted, `${what}.deleted`),
  };
}

function parseRegister(raw: unknown, what: string): LwwState {
  if (raw === null) return null;
  const rec = expectRecord(raw, what);
  return { value: expectValue(rec.value, `${what}.value`), stamp: expectStamp(rec.stamp, `${what}.stamp`) };
}

/** Validates a field state read back from storage. */
export function parseFieldState(strategy: CrdtStrategy, raw: unknown, what = "state"): FieldState {
  switch (strategy) {
    case "immutable":
      return { strategy, state: parseRegister(raw, what) };
    case "lww":
      return { strategy, state: parseRegister(raw, what) };
    case "or_set": {
      const rec = expectRecord(raw, what);
      return {
        strategy,
        state: {
          adds: mapRecord(rec.adds, `${what}.adds`, (v, k) => expectValue(v, `${what}.adds.${k}`)),
          removed: expectTrueSet(rec.removed, `${what}.removed`),
        },
      };
    }
    case "pn_counter": {
      const rec = expectRecord(raw, what);
      return {
        strategy,
        state: {
          inc: mapRecord(rec.inc, `${what}.inc`, (v, k) => expectNumber(v, `${what}.inc.${k}`)),
          dec: mapRecord(rec.dec, `${what}.dec`, (v, k) => expectNumber(v, `${what}.dec.${k}`)),
        },
      };
    }
    case "rga":
      return { strategy, state: parseRgaState(raw, what) };
    case "mv_register": {
      const rec = expectRecord(raw, what);
      return {
        strategy,
        state: { entries: mapRecord(rec.entries, `${what}.entries`, (v, k) => parseMvEntry(v, `${what}.entries.${k}`)) },
      };
    }
    case "peritext": {
      const rec = expectRecord(raw, what);
      return {
        strategy,
        state: {
          chars: parseRgaState(rec.chars, `${what}.chars`),
          marks: mapRecord(rec.marks, `${what}.marks`, (v, k): PeritextMark => {
            const m = expectRecord(v, `${what}.marks.${k}`);
            return {
              type: expectString(m.type, `${what}.marks.${k}.type`),
              value: expectValue(m.value, `${what}.marks.${k}.value`),
              start: expectStampKey(m.start, `${what}.marks.${k}.start`),
              end: expectStampKey(m.end, `${what}.marks.${k}.end`),
              stamp: expectStamp(m.stamp, `${what}.marks.${k}.stamp`),
            };
          }),
        },
      };
    }
    default:
      return unreachable(strategy);
  }
}
