import { valueKey } from "./codec.js";
import { InvalidValueError } from "./errors.js";
import type { OpContext, Value } from "./types.js";
import { stampKey } from "./types.js";

/**
 * Observed-remove set. Every add carries a fresh tag; a remove names the
 * tags it observed, so an add it never saw survives it (add wins).
 *
 * Removed tags are kept as tombstones and their adds dropped, which keeps the
 * live payload proportional to the live elements.
 */
export type OrSetState = {
  adds: Record<string, Value>;
  removed: Record<string, true>;
};

export type OrSetOp =
  | { type: "add"; tag: string; value: Value }
  | { type: "remove"; tags: string[] };

export function emptyOrSet(): OrSetState {
  return { adds: {}, removed: {} };
}

export function absorbOrSet(target: OrSetState, source: OrSetState): OrSetState {
  for (const tag of Object.keys(source.removed)) {
    target.removed[tag] = true;
    delete target.adds[tag];
  }
  for (const [tag, value] of Object.entries(source.adds)) {
    if (target.removed[tag]) continue;
    target.adds[tag] = value;
  }
  return target;
}

export function mergeOrSet(a: OrSetState, b: OrSetState): OrSetState {
  return absorbOrSet(structuredClone(a), b);
}

export function orSetFragment(op: OrSetOp): OrSetState {
  if (op.type === "add") return { adds: { [op.tag]: op.value }, removed: {} };
  const removed: Record<string, true> = {};
  for (const tag of op.tags) removed[tag] = true;
  return { adds: {}, removed };
}

function liveByKey(state: OrSetState): Map<string, { value: Value; tags: string[] }> {
  const byKey = new Map<string, { value: Value; tags: string[] }>();
  for (const [tag, value] of Object.entries(state.adds)) {
    const key = valueKey(value);
    const entry = byKey.get(key);
    if (entry) entry.tags.push(tag);
    else byKey.set(key, { value, tags: [tag] });
  }
  return byKey;
}

/** Elements ordered by their canonical encoding. */
export function readOrSet(state: OrSetState): Value[] {
  const byKey = liveByKey(state);
  return Array.from(byKey.keys())
    .sort()
    .map((key) => byKey.get(key)?.value ?? null);
}

export function orSetHas(state: OrSetState, value: Value): boolean {
  return liveByKey(state).has(valueKey(value));
}

export function orSetAdd(value: Value, ctx: OpContext, index = 0): OrSetOp {
  return { type: "add", tag: `${stampKey(ctx)}#${index}`, value };
}

export function orSetRemove(state: OrSetState, value: Value): OrSetOp | null {
  const entry = liveByKey(state).get(valueKey(value));
  if (!entry) return null;
  return { type: "remove", tags: entry.tags.sort() };
}

export function diffOrSet(state: OrSetState, next: Value, ctx: OpContext): OrSetOp[] {
  if (!Array.isArray(next)) throw new InvalidValueError("or_set value must be an array");
  const live = liveByKey(state);
  const nextKeys = new Map<string, Value>();
  for (const value of next) nextKeys.set(valueKey(value), value);

  const ops: OrSetOp[] = [];
  const removedTags: string[] = [];
  for (const [key, entry] of live) {
    if (!nextKeys.has(key)) removedTags.push(...entry.tags);
  }
  if (removedTags.length > 0) ops.push({ type: "remove", tags: removedTags.sort() });

  let index = 0;
  for (const key of Array.from(nextKeys.keys()).sort()) {
    if (live.has(key)) continue;
    const value = nextKeys.get(key) ?? null;
    ops.push({ type: "add", tag: `${stampKey(ctx)}#${index}`, value });
    index += 1;
  }
  return ops;
}
