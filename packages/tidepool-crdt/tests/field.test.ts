import fc from "fast-check";
import { expect, test } from "vitest";

import {
  InvalidValueError,
  StrategyMismatchError,
  applyFieldOp,
  cloneField,
  diffField,
  emptyField,
  encodeCanonical,
  mergeField,
  parseFieldOp,
  parseFieldState,
  readField,
} from "../src/index.js";
import type { CrdtStrategy, FieldOp, FieldState, Value } from "../src/index.js";

type Write = { actor: string; value: Value };

const ACTORS = ["a", "b", "c"];

function replicaStates(strategy: CrdtStrategy, writes: Write[]): { states: FieldState[]; ops: FieldOp[] } {
  const ops: FieldOp[] = [];
  const states = ACTORS.map((actor) => {
    let state = emptyField(strategy);
    let clock = 0;
    for (const w of writes) {
      if (w.actor !== actor) continue;
      clock += 1;
      for (const op of diffField(state, w.value, { actor, clock })) {
        state = applyFieldOp(state, op);
        ops.push(op);
      }
    }
    return state;
  });
  return { states, ops };
}

const peritextView: fc.Arbitrary<Value> = fc
  .array(fc.constantFrom("x", "y", "z"), { maxLength: 4 })
  .chain((chars) => {
    const text = chars.join("");
    if (chars.length === 0) return fc.constant<Value>({ text, marks: [] });
    const span = fc.record({
      start: fc.nat(chars.length - 1),
      width: fc.integer({ min: 1, max: chars.length }),
      type: fc.constantFrom("bold", "color"),
      value: fc.constantFrom<Value>(true, "red"),
    });
    return fc.array(span, { maxLength: 2 }).map(
      (spans): Value => ({
        text,
        marks: spans.map((s) => ({
          start: s.start,
          end: Math.min(s.start + s.width, chars.length),
          type: s.type,
          value: s.value,
        })),
      }),
    );
  });

const CASES: [string, CrdtStrategy, fc.Arbitrary<Value>][] = [
  ["immutable", "immutable", fc.constant<Value>("fixed")],
  ["lww", "lww", fc.string({ maxLength: 4 })],
  ["or_set", "or_set", fc.uniqueArray(fc.integer({ min: 0, max: 6 }), { maxLength: 5 })],
  ["pn_counter", "pn_counter", fc.integer({ min: -50, max: 50 })],
  ["pn_counter with fractional steps", "pn_counter", fc.integer({ min: -50, max: 50 }).map((n) => n / 10)],
  ["rga", "rga", fc.array(fc.constantFrom("p", "q", "r"), { maxLength: 5 })],
  ["mv_register", "mv_register", fc.string({ maxLength: 3 }).map((s): Value => [s])],
  ["peritext", "peritext", peritextView],
];

for (const [name, strategy, arb] of CASES) {
  const writes = fc.array(fc.record({ actor: fc.constantFrom(...ACTORS), value: arb }), { maxLength: 12 });

  test(`${name}: merge is commutative, associative and idempotent`, () => {
    fc.assert(
      fc.property(writes, (ws) => {
        const [a, b, c] = replicaStates(strategy, ws).states;
        if (!a || !b || !c) return;
        expect(readField(mergeField(a, b))).toEqual(readField(mergeField(b, a)));
        expect(readField(mergeField(mergeField(a, b), c))).toEqual(readField(mergeField(a, mergeField(b, c))));
        expect(readField(mergeField(a, a))).toEqual(readField(a));
        expect(readField(mergeField(mergeField(a, b), b))).toEqual(readField(mergeField(a, b)));
      }),
    );
  });

  test(`${name}: op delivery order does not change the result`, () => {
    fc.assert(
      fc.property(writes, (ws) => {
        const { ops } = replicaStates(strategy, ws);
        const forward = ops.reduce((s, op) => applyFieldOp(s, op), emptyField(strategy));
        const backward = [...ops].reverse().reduce((s, op) => applyFieldOp(s, op), emptyField(strategy));
        const twice = ops.reduce((s, op) => applyFieldOp(s, op), cloneField(forward));
        expect(encodeCanonical(readField(forward))).toEqual(encodeCanonical(readField(backward)));
        expect(readField(twice)).toEqual(readField(forward));
      }),
    );
  });
}

test("pn_counter: fractional steps read the same in any delivery order", () => {
  const ops = ACTORS.map((actor, i) => {
    const [op] = diffField(emptyField("pn_counter"), [0.3, 0.1, 0.2][i] ?? 0, { actor, clock: 1 });
    return op;
  }).filter((op): op is FieldOp => op !== undefined);
  expect(ops).toHaveLength(3);
  const [a, b, c] = ops;
  if (!a || !b || !c) return;
  const d = [b, c, a].reduce((s, op) => applyFieldOp(s, op), emptyField("pn_counter"));
  const e = [a, c, b].reduce((s, op) => applyFieldOp(s, op), emptyField("pn_counter"));
  expect(readField(d)).toBe(0.3 + 0.1 + 0.2);
  expect(encodeCanonical(readField(d))).toEqual(encodeCanonical(readField(e)));
});

test("diffField: a local write is reflected in the view", () => {
  let state = emptyField("pn_counter");
  for (const op of diffField(state, 42, { actor: "a", clock: 1 })) state = applyFieldOp(state, op);
  expect(readField(state)).toBe(42);
  expect(diffField(state, 42, { actor: "a", clock: 2 })).toEqual([]);
});

test("merging different strategies is refused", () => {
  expect(() => mergeField(emptyField("lww"), emptyField("or_set"))).toThrow(StrategyMismatchError);
});

test("parseFieldOp: validates the op against the declared strategy", () => {
  expect(parseFieldOp("lww", { type: "set", value: "v", stamp: { clock: 1, actor: "a" } })).toEqual({
    strategy: "lww",
    op: { type: "set", value: "v", stamp: { clock: 1, actor: "a" } },
  });
  expect(() => parseFieldOp("lww", { type: "add", tag: "1@a#0", value: 1 })).toThrow(InvalidValueError);
  expect(() => parseFieldOp("pn_counter", { type: "accumulate", actor: "a", inc: -1, dec: 0 })).toThrow(
    InvalidValueError,
  );
  expect(() => parseFieldOp("rga", { type: "delete", ids: ["not-an-id"] })).toThrow(InvalidValueError);
  expect(() => parseFieldOp("or_set", { type: "add", tag: "t", value: () => 1 })).toThrow(InvalidValueError);
});

test("parseFieldState: accepts what the library produces", () => {
  let state = emptyField("rga");
  for (const op of diffField(state, ["x", "y"], { actor: "a", clock: 1 })) state = applyFieldOp(state, op);
  const parsed = parseFieldState("rga", structuredClone(state.state));
  expect(readField(parsed)).toEqual(["x", "y"]);
  expect(() => parseFieldState("rga", { elements: {}, deleted: { "1@a": false } })).toThrow(InvalidValueError);
});
