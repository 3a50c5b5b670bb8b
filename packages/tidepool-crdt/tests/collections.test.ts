import { expect, test } from "vitest";

import {
  InvalidValueError,
  diffOrSet,
  diffRga,
  emptyOrSet,
  emptyPnCounter,
  emptyRga,
  mergeOrSet,
  mergePnCounter,
  mergeRga,
  orSetAdd,
  orSetFragment,
  orSetRemove,
  pnCounterAdd,
  pnCounterFragment,
  readOrSet,
  readPnCounter,
  readRga,
  rgaDeleteAt,
  rgaFragment,
  rgaInsertAt,
} from "../src/index.js";
import type { OrSetState, PnCounterState, RgaOp, RgaState } from "../src/index.js";

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  const out: T[][] = [];
  items.forEach((item, i) => {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const p of permutations(rest)) out.push([item, ...p]);
  });
  return out;
}

function applyOrSet(state: OrSetState, ops: ReturnType<typeof diffOrSet>): OrSetState {
  return ops.reduce((acc, op) => mergeOrSet(acc, orSetFragment(op)), state);
}

function applyRga(state: RgaState, ops: RgaOp[]): RgaState {
  return ops.reduce((acc, op) => mergeRga(acc, rgaFragment(op)), state);
}

test("or_set: two offline replicas adding 500 items each merge to 1000", () => {
  const itemsA = Array.from({ length: 500 }, (_, i) => `a-${i}`);
  const itemsB = Array.from({ length: 500 }, (_, i) => `b-${i}`);

  const a = applyOrSet(emptyOrSet(), diffOrSet(emptyOrSet(), itemsA, { actor: "A", clock: 1 }));
  const b = applyOrSet(emptyOrSet(), diffOrSet(emptyOrSet(), itemsB, { actor: "B", clock: 1 }));

  const ab = readOrSet(mergeOrSet(a, b));
  const ba = readOrSet(mergeOrSet(b, a));
  expect(ab).toHaveLength(1000);
  expect(ab).toEqual(ba);
});

test("or_set: a concurrent add survives a remove that did not observe it", () => {
  const base = mergeOrSet(emptyOrSet(), orSetFragment(orSetAdd("apple", { actor: "A", clock: 1 })));

  const remove = orSetRemove(base, "apple");
  expect(remove).not.toBeNull();
  if (!remove) return;
  const removedAtA = mergeOrSet(base, orSetFragment(remove));
  const readdedAtB = mergeOrSet(base, orSetFragment(orSetAdd("apple", { actor: "B", clock: 2 })));

  expect(readOrSet(removedAtA)).toEqual([]);
  expect(readOrSet(mergeOrSet(removedAtA, readdedAtB))).toEqual(["apple"]);
  expect(readOrSet(mergeOrSet(readdedAtB, removedAtA))).toEqual(["apple"]);
});

test("or_set: re-adding after a removal uses a fresh tag", () => {
  let state = emptyOrSet();
  state = applyOrSet(state, diffOrSet(state, ["p"], { actor: "A", clock: 1 }));
  state = applyOrSet(state, diffOrSet(state, [], { actor: "A", clock: 2 }));
  expect(readOrSet(state)).toEqual([]);
  state = applyOrSet(state, diffOrSet(state, ["p"], { actor: "A", clock: 3 }));
  expect(readOrSet(state)).toEqual(["p"]);
  expect(Object.keys(state.adds)).toEqual(["3@A#0"]);
  expect(Object.keys(state.removed)).toEqual(["1@A#0"]);
});

test("or_set: non-array writes are rejected", () => {
  expect(() => diffOrSet(emptyOrSet(), "nope", { actor: "A", clock: 1 })).toThrow(InvalidValueError);
});

test("pn_counter: +10 +10 +10 -5 converges to 25 in every merge order", () => {
  const parts: PnCounterState[] = [
    pnCounterFragment(pnCounterAdd(emptyPnCounter(), 10, { actor: "A", clock: 1 })),
    pnCounterFragment(pnCounterAdd(emptyPnCounter(), 10, { actor: "B", clock: 1 })),
    pnCounterFragment(pnCounterAdd(emptyPnCounter(), 10, { actor: "C", clock: 1 })),
    pnCounterFragment(pnCounterAdd(emptyPnCounter(), -5, { actor: "D", clock: 1 })),
  ];
  for (const order of permutations(parts)) {
    const merged = order.reduce((acc, p) => mergePnCounter(acc, p), emptyPnCounter());
    expect(readPnCounter(merged)).toBe(25);
  }
});

test("pn_counter: re-delivering an accumulator does not double count", () => {
  let state = emptyPnCounter();
  const first = pnCounterAdd(state, 7, { actor: "A", clock: 1 });
  state = mergePnCounter(state, pnCounterFragment(first));
  const second = pnCounterAdd(state, 3, { actor: "A", clock: 2 });
  state = mergePnCounter(state, pnCounterFragment(second));
  state = mergePnCounter(state, pnCounterFragment(first));
  state = mergePnCounter(state, pnCounterFragment(second));
  expect(readPnCounter(state)).toBe(10);
  expect(readPnCounter(mergePnCounter(state, pnCounterFragment(pnCounterAdd(state, -30, { actor: "B", clock: 3 }))), { min: 0 })).toBe(0);
});

test("rga: concurrent inserts at the same position interleave identically", () => {
  const base = applyRga(emptyRga(), [rgaInsertAt(emptyRga(), 0, ["a", "b"], { actor: "A", clock: 1 })]);
  expect(readRga(base)).toEqual(["a", "b"]);

  const atA = applyRga(base, [rgaInsertAt(base, 1, ["x"], { actor: "A", clock: 3 })]);
  const atB = applyRga(base, [rgaInsertAt(base, 1, ["y"], { actor: "B", clock: 3 })]);

  expect(readRga(mergeRga(atA, atB))).toEqual(["a", "y", "x", "b"]);
  expect(readRga(mergeRga(atB, atA))).toEqual(["a", "y", "x", "b"]);
});

test("rga: deletes are tombstones that concurrent inserts can still anchor to", () => {
  const base = applyRga(emptyRga(), [rgaInsertAt(emptyRga(), 0, ["a", "b", "c"], { actor: "A", clock: 1 })]);
  const deleted = applyRga(base, [rgaDeleteAt(base, 1)]);
  const inserted = applyRga(base, [rgaInsertAt(base, 2, ["q"], { actor: "B", clock: 4 })]);

  expect(readRga(deleted)).toEqual(["a", "c"]);
  expect(readRga(mergeRga(deleted, inserted))).toEqual(["a", "q", "c"]);
  expect(readRga(mergeRga(inserted, deleted))).toEqual(["a", "q", "c"]);
  expect(Object.keys(mergeRga(deleted, inserted).elements)).toHaveLength(4);
});

test("rga: diff replaces only the changed middle", () => {
  const ctx = { actor: "A", clock: 1 };
  const base = applyRga(emptyRga(), diffRga(emptyRga(), ["a", "b", "c"], ctx));
  const ops = diffRga(base, ["a", "z", "c"], { actor: "A", clock: 2 });

  expect(ops).toEqual([
    { type: "delete", ids: ["2@A"] },
    { type: "insert", elements: [{ id: "4@A", left: "1@A", value: "z" }] },
  ]);
  expect(readRga(applyRga(base, ops))).toEqual(["a", "z", "c"]);
});

test("rga: an insert whose anchor has not arrived stays hidden until it does", () => {
  const ctx = { actor: "A", clock: 1 };
  const first = rgaInsertAt(emptyRga(), 0, ["a"], ctx);
  const afterFirst = applyRga(emptyRga(), [first]);
  const second = rgaInsertAt(afterFirst, 1, ["b"], { actor: "A", clock: 2 });

  const early = applyRga(emptyRga(), [second]);
  expect(readRga(early)).toEqual([]);
  expect(readRga(applyRga(early, [first]))).toEqual(["a", "b"]);
});
