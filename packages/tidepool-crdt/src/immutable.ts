import { valuesEqual } from "./codec.js";
import { ImmutableConflictError } from "./errors.js";
import type { OpContext, Stamp, Value } from "./types.js";
import { compareStamps } from "./types.js";

export type ImmutableState = { value: Value; stamp: Stamp } | null;

export type ImmutableOp = { type: "set"; value: Value; stamp: Stamp };

/**
 * Set-once register. Equal concurrent sets collapse onto the lowest stamp;
 * differing ones throw.
 */
export function mergeImmutable(a: ImmutableState, b: ImmutableState, path?: string): ImmutableState {
  if (!a) return b;
  if (!b) return a;
  if (!valuesEqual(a.value, b.value)) throw new ImmutableConflictError(path);
  return compareStamps(a.stamp, b.stamp) <= 0 ? a : b;
}

export function immutableFragment(op: ImmutableOp): ImmutableState {
  return { value: op.value, stamp: op.stamp };
}

export function readImmutable(state: ImmutableState): Value {
  return state ? state.value : null;
}

export function diffImmutable(
  state: ImmutableState,
  next: Value,
  ctx: OpContext,
  path?: string,
): ImmutableOp[] {
  if (valuesEqual(readImmutable(state), next)) return [];
  if (state) throw new ImmutableConflictError(path);
  return [{ type: "set", value: next, stamp: { clock: ctx.clock, actor: ctx.actor } }];
}
