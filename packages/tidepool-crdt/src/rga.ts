import { valuesEqual } from "./codec.js";
import { InvalidValueError } from "./errors.js";
import type { OpContext, Value } from "./types.js";
import { compareStampKeys, parseStampKey, stampKey } from "./types.js";

/**
 * Replicated growable array.
 *
 * Every element records the element it was inserted after (`left`, `null` for
 * the head). The order is a depth-first walk of that tree with siblings
 * visited newest id first, so an insert lands directly after its left origin
 * on every replica. Deletes are tombstones; tombstoned elements keep their
 * place so later inserts can still anchor to them.
 */
export type RgaElement = { left: string | null; value: Value };

export type RgaState = {
  elements: Record<string, RgaElement>;
  deleted: Record<string, true>;
};

export type RgaInsert = { id: string; left: string | null; value: Value };

export type RgaOp =
  | { type: "insert"; elements: RgaInsert[] }
  | { type: "delete"; ids: string[] };

export function emptyRga(): RgaState {
  return { elements: {}, deleted: {} };
}

export function absorbRga(target: RgaState, source: RgaState): RgaState {
  for (const [id, element] of Object.entries(source.elements)) {
    if (!(id in target.elements)) target.elements[id] = element;
  }
  for (const id of Object.keys(source.deleted)) target.deleted[id] = true;
  return target;
}

export function mergeRga(a: RgaState, b: RgaState): RgaState {
  return absorbRga(structuredClone(a), b);
}

export function rgaFragment(op: RgaOp): RgaState {
  const state = emptyRga();
  if (op.type === "insert") {
    for (const el of op.elements) state.elements[el.id] = { left: el.left, value: el.value };
  } else {
    for (const id of op.ids) state.deleted[id] = true;
  }
  return state;
}

/**
 * Every reachable element id in document order, tombstones included.
 * Elements whose left origin has not arrived yet are not reachable.
 */
export function rgaOrder(state: RgaState): string[] {
  const children = new Map<string | null, string[]>();
  for (const [id, el] of Object.entries(state.elements)) {
    const list = children.get(el.left);
    if (list) list.push(id);
    else children.set(el.left, [id]);
  }
  // Ascending here so that popping from the stack visits the newest first.
  for (const list of children.values()) list.sort(compareStampKeys);

  const out: string[] = [];
  const stack = [...(children.get(null) ?? [])];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    out.push(id);
    const kids = children.get(id);
    if (kids) stack.push(...kids);
  }
  return out;
}

export function visibleRga(state: RgaState): { id: string; value: Value }[] {
  const out: { id: string; value: Value }[] = [];
  for (const id of rgaOrder(state)) {
    if (state.deleted[id]) continue;
    const el = state.elements[id];
    if (el) out.push({ id, value: el.value });
  }
  return out;
}

export function readRga(state: RgaState): Value[] {
  return visibleRga(state).map((e) => e.value);
}

/** Highest clock used by any element id. */
export function rgaMaxClock(state: RgaState): number {
  let max = 0;
  for (const id of Object.keys(state.elements)) {
    const { clock } = parseStampKey(id);
    if (clock > max) max = clock;
  }
  return max;
}

/**
 * Builds a chained run of inserts after `left`. Ids start above every clock
 * already present so the run sorts ahead of existing siblings.
 */
export function rgaInsertRun(
  state: RgaState,
  left: string | null,
  values: Value[],
  ctx: OpContext,
  minClock = 0,
): RgaInsert[] {
  const base = Math.max(ctx.clock, rgaMaxClock(state) + 1, minClock);
  const out: RgaInsert[] = [];
  let prev = left;
  values.forEach((value, i) => {
    const id = stampKey({ clock: base + i, actor: ctx.actor });
    out.push({ id, left: prev, value });
    prev = id;
  });
  return out;
}

export function rgaInsertAt(state: RgaState, index: number, values: Value[], ctx: OpContext): RgaOp {
  const visible = visibleRga(state);
  if (!Number.isInteger(index) || index < 0 || index > visible.length) {
    throw new InvalidValueError(`insert index ${index} out of range 0..${visible.length}`);
  }
  const left = index === 0 ? null : (visible[index - 1]?.id ?? null);
  return { type: "insert", elements: rgaInsertRun(state, left, values, ctx) };
}

export function rgaDeleteAt(state: RgaState, index: number, count = 1): RgaOp {
  const visible = visibleRga(state);
  if (!Number.isInteger(index) || index < 0 || index + count > visible.length) {
    throw new InvalidValueError(`delete range ${index}+${count} out of range 0..${visible.length}`);
  }
  return { type: "delete", ids: visible.slice(index, index + count).map((e) => e.id) };
}

/**
 * Splits two sequences into common prefix, replaced middle and common suffix.
 */
export function sequenceSplice<T, U>(
  current: T[],
  next: U[],
  same: (a: T, b: U) => boolean,
): { prefix: number; suffix: number } {
  let prefix = 0;
  const max = Math.min(current.length, next.length);
  while (prefix < max) {
    const a = current[prefix];
    const b = next[prefix];
    if (a === undefined || b === undefined || !same(a, b)) break;
    prefix += 1;
  }
  let suffix = 0;
  while (suffix < max - prefix) {
    const a = current[current.length - 1 - suffix];
    const b = next[next.length - 1 - suffix];
    if (a === undefined || b === undefined || !same(a, b)) break;
    suffix += 1;
  }
  return { prefix, suffix };
}

export function diffRga(state: RgaState, next: Value, ctx: OpContext): RgaOp[] {
  if (!Array.isArray(next)) throw new InvalidValueError("rga value must be an array");
  const visible = visibleRga(state);
  const { prefix, suffix } = sequenceSplice(visible, next, (a, b) => valuesEqual(a.value, b));

  const ops: RgaOp[] = [];
  const removed = visible.slice(prefix, visible.length - suffix).map((e) => e.id);
  if (removed.length > 0) ops.push({ type: "delete", ids: removed });

  const inserted = next.slice(prefix, next.length - suffix);
  if (inserted.length > 0) {
    const left = prefix === 0 ? null : (visible[prefix - 1]?.id ?? null);
    ops.push({ type: "insert", elements: rgaInsertRun(state, left, inserted, ctx) });
  }
  return ops;
}
