import { InvalidValueError } from "./errors.js";
import type { ActorId, NumericBound, OpContext, Value } from "./types.js";
import { clampToBound, withinBound } from "./types.js";

/**
 * Per-actor increment and decrement accumulators. Each accumulator only grows,
 * so merging by per-actor maximum never double counts.
 */
export type PnCounterState = {
  inc: Record<ActorId, number>;
  dec: Record<ActorId, number>;
};

/** Carries the writer's new accumulator totals, not the step. */
export type PnCounterOp = {
  type: "accumulate";
  actor: ActorId;
  inc: number;
  dec: number;
};

export function emptyPnCounter(): PnCounterState {
  return { inc: {}, dec: {} };
}

function absorbSide(target: Record<ActorId, number>, source: Record<ActorId, number>) {
  for (const [actor, n] of Object.entries(source)) {
    const current = target[actor];
    if (current === undefined || n > current) target[actor] = n;
  }
}

export function absorbPnCounter(target: PnCounterState, source: PnCounterState): PnCounterState {
  absorbSide(target.inc, source.inc);
  absorbSide(target.dec, source.dec);
  return target;
}

export function mergePnCounter(a: PnCounterState, b: PnCounterState): PnCounterState {
  return absorbPnCounter(structuredClone(a), b);
}

export function pnCounterFragment(op: PnCounterOp): PnCounterState {
  return { inc: { [op.actor]: op.inc }, dec: { [op.actor]: op.dec } };
}

/** Adds in actor order, so replicas with equal state agree on fractional totals. */
function sum(side: Record<ActorId, number>): number {
  let total = 0;
  for (const actor of Object.keys(side).sort()) total += side[actor] ?? 0;
  return total;
}

/** Unclamped total. */
export function pnCounterTotal(state: PnCounterState): number {
  return sum(state.inc) - sum(state.dec);
}

export function readPnCounter(state: PnCounterState, bound?: NumericBound): number {
  return clampToBound(pnCounterTotal(state), bound);
}

export function pnCounterAdd(state: PnCounterState, amount: number, ctx: OpContext): PnCounterOp {
  if (!Number.isFinite(amount)) throw new InvalidValueError("counter step must be a finite number");
  const inc = (state.inc[ctx.actor] ?? 0) + (amount > 0 ? amount : 0);
  const dec = (state.dec[ctx.actor] ?? 0) + (amount < 0 ? -amount : 0);
  return { type: "accumulate", actor: ctx.actor, inc, dec };
}

export function diffPnCounter(
  state: PnCounterState,
  next: Value,
  ctx: OpContext,
  bound?: NumericBound,
): PnCounterOp[] {
  if (typeof next !== "number" || !Number.isFinite(next)) {
    throw new InvalidValueError("pn_counter value must be a finite number");
  }
  if (bound && !withinBound(next, bound)) {
    throw new InvalidValueError(`value ${next} is outside the declared bound`);
  }
  const step = next - pnCounterTotal(state);
  if (step === 0) return [];
  return [pnCounterAdd(state, step, ctx)];
}
