import { InvalidValueError } from "./errors.js";
import type { ActorId, OpContext, Stamp, Value } from "./types.js";
import { compareStamps, stampKey } from "./types.js";

/**
 * Multi-value register. Each write is tagged with its dot and the causal
 * context (`seen`) it was made in; a write whose dot is covered by another
 * entry's context has been overwritten and is dropped. Concurrent writes
 * survive side by side until a later write sees them all.
 */
export type MvEntry = {
  value: Value;
  dot: Stamp;
  seen: Record<ActorId, number>;
};

export type MvRegisterState = {
  entries: Record<string, MvEntry>;
};

export type MvRegisterOp = { type: "write"; entry: MvEntry };

export function emptyMvRegister(): MvRegisterState {
  return { entries: {} };
}

function dominated(entry: MvEntry, by: MvEntry): boolean {
  if (by === entry) return false;
  const seen = by.seen[entry.dot.actor];
  return seen !== undefined && seen >= entry.dot.clock && compareStamps(by.dot, entry.dot) !== 0;
}

function prune(state: MvRegisterState): MvRegisterState {
  const all = Object.entries(state.entries);
  for (const [key, entry] of all) {
    if (all.some(([, other]) => dominated(entry, other))) delete state.entries[key];
  }
  return state;
}

export function absorbMvRegister(target: MvRegisterState, source: MvRegisterState): MvRegisterState {
  for (const [key, entry] of Object.entries(source.entries)) {
    if (!(key in target.entries)) target.entries[key] = entry;
  }
  return prune(target);
}

export function mergeMvRegister(a: MvRegisterState, b: MvRegisterState): MvRegisterState {
  return absorbMvRegister(structuredClone(a), b);
}

export function mvRegisterFragment(op: MvRegisterOp): MvRegisterState {
  return { entries: { [stampKey(op.entry.dot)]: op.entry } };
}

function sortedEntries(state: MvRegisterState): MvEntry[] {
  return Object.values(state.entries).sort((a, b) => compareStamps(a.dot, b.dot));
}

/** Concurrent values ordered by their dot; empty when never written. */
export function readMvRegister(state: MvRegisterState): Value[] {
  return sortedEntries(state).map((e) => e.value);
}

export function mvRegisterWrite(state: MvRegisterState, value: Value, ctx: OpContext): MvRegisterOp {
  const seen: Record<ActorId, number> = {};
  for (const entry of Object.values(state.entries)) {
    for (const [actor, clock] of Object.entries(entry.seen)) {
      const current = seen[actor];
      if (current === undefined || clock > current) seen[actor] = clock;
    }
  }
  seen[ctx.actor] = Math.max(seen[ctx.actor] ?? 0, ctx.clock);
  return { type: "write", entry: { value, dot: { clock: ctx.clock, actor: ctx.actor }, seen } };
}

/**
 * A write replaces the whole set of concurrent values, so the new view must
 * hold exactly one value.
 */
export function diffMvRegister(state: MvRegisterState, next: Value, ctx: OpContext): MvRegisterOp[] {
  if (!Array.isArray(next) || next.length !== 1) {
    throw new InvalidValueError("mv_register writes must be a single-element array");
  }
  const [value] = next;
  if (value === undefined) throw new InvalidValueError("mv_register writes must be a single-element array");
  return [mvRegisterWrite(state, value, ctx)];
}
