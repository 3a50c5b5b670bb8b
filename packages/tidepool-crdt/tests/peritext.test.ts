import { expect, test } from "vitest";

import {
  InvalidValueError,
  diffPeritext,
  emptyPeritext,
  mergePeritext,
  peritextFragment,
  readPeritext,
} from "../src/index.js";
import type { PeritextOp, PeritextState } from "../src/index.js";

function apply(state: PeritextState, ops: PeritextOp[]): PeritextState {
  return ops.reduce((acc, op) => mergePeritext(acc, peritextFragment(op)), state);
}

function hello(): PeritextState {
  return apply(emptyPeritext(), diffPeritext(emptyPeritext(), { text: "hello", marks: [] }, { actor: "A", clock: 1 }));
}

test("peritext: text edits and formatting materialise as spans", () => {
  const base = hello();
  expect(readPeritext(base)).toEqual({ text: "hello", marks: [] });

  const ops = diffPeritext(
    base,
    { text: "hello", marks: [{ start: 1, end: 4, type: "bold", value: true }] },
    { actor: "A", clock: 6 },
  );
  expect(ops).toEqual([{ type: "mark", id: "6@A", markType: "bold", value: true, start: "2@A", end: "4@A" }]);
  expect(readPeritext(apply(base, ops))).toEqual({
    text: "hello",
    marks: [{ start: 1, end: 4, type: "bold", value: true }],
  });
});

test("peritext: text typed inside a concurrently bolded range is bold", () => {
  const base = hello();
  const bold = apply(
    base,
    diffPeritext(base, { text: "hello", marks: [{ start: 1, end: 4, type: "bold", value: true }] }, { actor: "A", clock: 6 }),
  );
  const typed = apply(base, diffPeritext(base, { text: "heXllo", marks: [] }, { actor: "B", clock: 6 }));

  const expected = { text: "heXllo", marks: [{ start: 1, end: 5, type: "bold", value: true }] };
  expect(readPeritext(mergePeritext(bold, typed))).toEqual(expected);
  expect(readPeritext(mergePeritext(typed, bold))).toEqual(expected);
});

test("peritext: the later mark of a type wins and null clears formatting", () => {
  const base = hello();
  const red = apply(
    base,
    diffPeritext(base, { text: "hello", marks: [{ start: 0, end: 5, type: "color", value: "red" }] }, { actor: "A", clock: 6 }),
  );
  const cleared = apply(
    red,
    diffPeritext(
      red,
      {
        text: "hello",
        marks: [
          { start: 0, end: 2, type: "color", value: "red" },
          { start: 3, end: 5, type: "color", value: "red" },
        ],
      },
      { actor: "B", clock: 7 },
    ),
  );
  expect(readPeritext(cleared)).toEqual({
    text: "hello",
    marks: [
      { start: 0, end: 2, type: "color", value: "red" },
      { start: 3, end: 5, type: "color", value: "red" },
    ],
  });
});

test("peritext: malformed views are rejected", () => {
  const ctx = { actor: "A", clock: 1 };
  expect(() => diffPeritext(emptyPeritext(), "plain", ctx)).toThrow(InvalidValueError);
  expect(() =>
    diffPeritext(emptyPeritext(), { text: "ab", marks: [{ start: 0, end: 3, type: "bold", value: true }] }, ctx),
  ).toThrow(InvalidValueError);
});
