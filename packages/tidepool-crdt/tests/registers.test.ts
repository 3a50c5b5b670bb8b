import { expect, test } from "vitest";

import {
  ImmutableConflictError,
  InvalidValueError,
  diffImmutable,
  diffLww,
  emptyMvRegister,
  mergeImmutable,
  mergeLww,
  mergeMvRegister,
  mvRegisterFragment,
  mvRegisterWrite,
  diffMvRegister,
  readLww,
  readMvRegister,
} from "../src/index.js";
import type { LwwState } from "../src/index.js";

test("lww: equal clocks resolve by actor id on every replica", () => {
  const a: LwwState = { value: "x", stamp: { clock: 5, actor: "A" } };
  const b: LwwState = { value: "y", stamp: { clock: 5, actor: "B" } };

  expect(readLww(mergeLww(a, b))).toBe("y");
  expect(readLww(mergeLww(b, a))).toBe("y");
});

test("lww: higher clock wins regardless of actor", () => {
  const a: LwwState = { value: "late", stamp: { clock: 9, actor: "A" } };
  const b: LwwState = { value: "early", stamp: { clock: 3, actor: "Z" } };

  expect(readLww(mergeLww(a, b))).toBe("late");
  expect(readLww(mergeLww(b, a))).toBe("late");
  expect(mergeLww(null, null)).toBeNull();
});

test("lww: numeric values clamp to the declared bound after merge", () => {
  const a: LwwState = { value: -4, stamp: { clock: 2, actor: "A" } };
  expect(readLww(mergeLww(a, null, { min: 0 }))).toBe(0);
  expect(readLww(mergeLww(null, { value: 12, stamp: { clock: 1, actor: "B" } }, { min: 0, max: 10 }))).toBe(10);
});

test("lww: a local write outside the bound is rejected", () => {
  expect(() => diffLww(null, -1, { actor: "A", clock: 1 }, { min: 0 })).toThrow(InvalidValueError);
  expect(diffLww(null, 3, { actor: "A", clock: 1 }, { min: 0 })).toEqual([
    { type: "set", value: 3, stamp: { clock: 1, actor: "A" } },
  ]);
  expect(diffLww({ value: 3, stamp: { clock: 1, actor: "A" } }, 3, { actor: "A", clock: 2 })).toEqual([]);
});

test("immutable: equal concurrent sets collapse, differing ones conflict", () => {
  const a = { value: "id-1", stamp: { clock: 4, actor: "B" } };
  const b = { value: "id-1", stamp: { clock: 2, actor: "C" } };
  expect(mergeImmutable(a, b)).toEqual(b);
  expect(mergeImmutable(b, a)).toEqual(b);

  const c = { value: "id-2", stamp: { clock: 1, actor: "A" } };
  expect(() => mergeImmutable(a, c, "id")).toThrow(ImmutableConflictError);
  expect(() => mergeImmutable(a, c, "id")).toThrow('immutable field "id" was set to conflicting values');
});

test("immutable: rewriting a set value is refused locally", () => {
  const state = { value: 1, stamp: { clock: 1, actor: "A" } };
  expect(diffImmutable(state, 1, { actor: "A", clock: 2 })).toEqual([]);
  expect(() => diffImmutable(state, 2, { actor: "A", clock: 2 })).toThrow(ImmutableConflictError);
});

test("mv_register: concurrent writes are kept until a later write sees them", () => {
  const fromA = mvRegisterFragment(mvRegisterWrite(emptyMvRegister(), "x", { actor: "A", clock: 1 }));
  const fromB = mvRegisterFragment(mvRegisterWrite(emptyMvRegister(), "y", { actor: "B", clock: 1 }));

  const merged = mergeMvRegister(fromA, fromB);
  expect(readMvRegister(merged)).toEqual(["x", "y"]);
  expect(readMvRegister(mergeMvRegister(fromB, fromA))).toEqual(["x", "y"]);

  const resolved = mvRegisterFragment(mvRegisterWrite(merged, "z", { actor: "A", clock: 2 }));
  expect(readMvRegister(mergeMvRegister(merged, resolved))).toEqual(["z"]);
  // A replica that only ever saw B's write still converges.
  expect(readMvRegister(mergeMvRegister(fromB, resolved))).toEqual(["z"]);
  expect(readMvRegister(mergeMvRegister(resolved, fromB))).toEqual(["z"]);
});

test("mv_register: writes must carry exactly one value", () => {
  expect(() => diffMvRegister(emptyMvRegister(), ["a", "b"], { actor: "A", clock: 1 })).toThrow(InvalidValueError);
  expect(() => diffMvRegister(emptyMvRegister(), "a", { actor: "A", clock: 1 })).toThrow(InvalidValueError);
});
