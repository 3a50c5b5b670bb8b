import { compareValues, valuesEqual } from "./codec.js";
import { InvalidValueError } from "./errors.js";
import type { NumericBound, OpContext, Stamp, Value } from "./types.js";
import { clampToBound, compareStamps, withinBound } from "./types.js";

/** `null` is the unset register. */
export type LwwState = { value: Value; stamp: Stamp } | null;

export type LwwOp = { type: "set"; value: Value; stamp: Stamp };

function clampEntry(entry: { value: Value; stamp: Stamp }, bound: NumericBound | undefined) {
  if (!bound || typeof entry.value !== "number") return entry;
  const clamped = clampToBound(entry.value, bound);
  return clamped === entry.value ? entry : { value: clamped, stamp: entry.stamp };
}

/**
 * Higher `(clock, actor)` wins. Equal stamps can only come from the same
 * write; the value comparison keeps the result independent of argument order
 * even if they do not.
 */
export function mergeLww(a: LwwState, b: LwwState, bound?: NumericBound): LwwState {
  if (!a) return b ? clampEntry(b, bound) : null;
  if (!b) return clampEntry(a, bound);
  const cmp = compareStamps(a.stamp, b.stamp);
  let winner = a;
  if (cmp < 0) winner = b;
  else if (cmp === 0 && compareValues(a.value, b.value) < 0) winner = b;
  return clampEntry(winner, bound);
}

export function lwwFragment(op: LwwOp): LwwState {
  return { value: op.value, stamp: op.stamp };
}

export function readLww(state: LwwState): Value {
  return state ? state.value : null;
}

export function diffLww(
  state: LwwState,
  next: Value,
  ctx: OpContext,
  bound?: NumericBound,
): LwwOp[] {
  if (valuesEqual(readLww(state), next)) return [];
  if (bound && typeof next === "number" && !withinBound(next, bound)) {
    throw new InvalidValueError(`value ${next} is outside the declared bound`);
  }
  return [{ type: "set", value: next, stamp: { clock: ctx.clock, actor: ctx.actor } }];
}
