import { isValueObject, valuesEqual } from "./codec.js";
import { InvalidValueError } from "./errors.js";
import type { OpContext, Stamp, Value } from "./types.js";
import { compareStamps, parseStampKey, stampKey } from "./types.js";
import type { RgaInsert, RgaState } from "./rga.js";
import {
  absorbRga,
  emptyRga,
  rgaFragment,
  rgaInsertRun,
  rgaMaxClock,
  rgaOrder,
  sequenceSplice,
  visibleRga,
} from "./rga.js";

/**
 * A formatting span anchored to character ids (both ends inclusive), so it
 * keeps covering the same characters when text moves around it. A `null`
 * value clears the formatting of its type.
 */
export type PeritextMark = {
  type: string;
  value: Value;
  start: string;
  end: string;
  stamp: Stamp;
};

export type PeritextState = {
  chars: RgaState;
  marks: Record<string, PeritextMark>;
};

export type PeritextOp =
  | { type: "insert"; elements: RgaInsert[] }
  | { type: "delete"; ids: string[] }
  | { type: "mark"; id: string; markType: string; value: Value; start: string; end: string };

/** Materialised span; `end` is exclusive and offsets count code points. */
export type PeritextSpan = { start: number; end: number; type: string; value: Value };

export type PeritextView = { text: string; marks: PeritextSpan[] };

export function emptyPeritext(): PeritextState {
  return { chars: emptyRga(), marks: {} };
}

export function absorbPeritext(target: PeritextState, source: PeritextState): PeritextState {
  absorbRga(target.chars, source.chars);
  for (const [id, mark] of Object.entries(source.marks)) {
    if (!(id in target.marks)) target.marks[id] = mark;
  }
  return target;
}

export function mergePeritext(a: PeritextState, b: PeritextState): PeritextState {
  return absorbPeritext(structuredClone(a), b);
}

export function peritextFragment(op: PeritextOp): PeritextState {
  const state = emptyPeritext();
  switch (op.type) {
    case "insert":
      state.chars = rgaFragment(op);
      return state;
    case "delete":
      state.chars = rgaFragment(op);
      return state;
    case "mark":
      state.marks[op.id] = {
        type: op.markType,
        value: op.value,
        start: op.start,
        end: op.end,
        stamp: parseStampKey(op.id),
      };
      return state;
    default: {
      const _exhaustive: never = op;
      throw new Error(`unknown peritext op: ${String(_exhaustive)}`);
    }
  }
}

type CharFormat = Map<string, { value: Value; stamp: Stamp }>;

/**
 * Resolves formatting per visible character. For each mark type the
 * covering mark with the greatest stamp wins.
 */
function formatVisible(state: PeritextState): { ids: string[]; text: string[]; formats: CharFormat[] } {
  const order = rgaOrder(state.chars);
  const position = new Map<string, number>();
  order.forEach((id, i) => position.set(id, i));

  const winners: CharFormat[] = order.map(() => new Map());
  for (const mark of Object.values(state.marks)) {
    const from = position.get(mark.start);
    const to = position.get(mark.end);
    if (from === undefined || to === undefined) continue;
    const lo = Math.min(from, to);
    const hi = Math.max(from, to);
    for (let i = lo; i <= hi; i += 1) {
      const format = winners[i];
      if (!format) continue;
      const current = format.get(mark.type);
      if (!current || compareStamps(current.stamp, mark.stamp) < 0) {
        format.set(mark.type, { value: mark.value, stamp: mark.stamp });
      }
    }
  }

  const ids: string[] = [];
  const text: string[] = [];
  const formats: CharFormat[] = [];
  order.forEach((id, i) => {
    if (state.chars.deleted[id]) return;
    const el = state.chars.elements[id];
    if (!el) return;
    ids.push(id);
    text.push(typeof el.value === "string" ? el.value : "");
    formats.push(winners[i] ?? new Map());
  });
  return { ids, text, formats };
}

function formatValue(format: CharFormat | undefined, type: string): Value {
  return format?.get(type)?.value ?? null;
}

function spansOf(formats: CharFormat[]): PeritextSpan[] {
  const types = new Set<string>();
  for (const f of formats) for (const t of f.keys()) types.add(t);

  const spans: PeritextSpan[] = [];
  for (const type of types) {
    let open: PeritextSpan | null = null;
    for (let i = 0; i < formats.length; i += 1) {
      const value = formatValue(formats[i], type);
      if (open && valuesEqual(open.value, value)) {
        open.end = i + 1;
        continue;
      }
      if (open) spans.push(open);
      open = value === null ? null : { start: i, end: i + 1, type, value };
    }
    if (open) spans.push(open);
  }
  return spans.sort((a, b) => a.start - b.start || (a.type < b.type ? -1 : a.type > b.type ? 1 : 0));
}

export function readPeritext(state: PeritextState): PeritextView {
  const { text, formats } = formatVisible(state);
  return { text: text.join(""), marks: spansOf(formats) };
}

export function peritextViewToValue(view: PeritextView): Value {
  return {
    text: view.text,
    marks: view.marks.map((m) => ({ start: m.start, end: m.end, type: m.type, value: m.value })),
  };
}

export function parsePeritextView(value: Value): PeritextView {
  if (!isValueObject(value) || typeof value.text !== "string" || !Array.isArray(value.marks)) {
    throw new InvalidValueError("peritext value must be { text, marks }");
  }
  const length = Array.from(value.text).length;
  const marks: PeritextSpan[] = [];
  for (const raw of value.marks) {
    if (
      !isValueObject(raw) ||
      typeof raw.start !== "number" ||
      typeof raw.end !== "number" ||
      typeof raw.type !== "string" ||
      raw.value === undefined
    ) {
      throw new InvalidValueError("peritext marks must be { start, end, type, value }");
    }
    if (!Number.isInteger(raw.start) || !Number.isInteger(raw.end) || raw.start < 0 || raw.end > length || raw.start >= raw.end) {
      throw new InvalidValueError(`peritext mark ${raw.start}..${raw.end} is outside the text`);
    }
    marks.push({ start: raw.start, end: raw.end, type: raw.type, value: raw.value });
  }
  return { text: value.text, marks };
}

function maxClock(state: PeritextState): number {
  let max = rgaMaxClock(state.chars);
  for (const mark of Object.values(state.marks)) if (mark.stamp.clock > max) max = mark.stamp.clock;
  return max;
}

export function diffPeritext(state: PeritextState, next: Value, ctx: OpContext): PeritextOp[] {
  const target = parsePeritextView(next);
  const ops: PeritextOp[] = [];
  const working = structuredClone(state);

  // Text first, so marks can anchor to freshly inserted characters.
  const visible = visibleRga(working.chars);
  const nextChars = Array.from(target.text);
  const { prefix, suffix } = sequenceSplice(visible, nextChars, (a, b) => a.value === b);
  const removed = visible.slice(prefix, visible.length - suffix).map((e) => e.id);
  if (removed.length > 0) {
    const op: PeritextOp = { type: "delete", ids: removed };
    ops.push(op);
    absorbPeritext(working, peritextFragment(op));
  }
  const inserted = nextChars.slice(prefix, nextChars.length - suffix);
  if (inserted.length > 0) {
    const left = prefix === 0 ? null : (visible[prefix - 1]?.id ?? null);
    const op: PeritextOp = {
      type: "insert",
      elements: rgaInsertRun(working.chars, left, inserted, ctx, maxClock(working) + 1),
    };
    ops.push(op);
    absorbPeritext(working, peritextFragment(op));
  }

  const { ids, formats } = formatVisible(working);
  const desired: Map<string, Value>[] = ids.map(() => new Map());
  for (const span of target.marks) {
    for (let i = span.start; i < span.end; i += 1) desired[i]?.set(span.type, span.value);
  }

  const types = new Set<string>();
  for (const f of formats) for (const t of f.keys()) types.add(t);
  for (const d of desired) for (const t of d.keys()) types.add(t);

  let clock = Math.max(ctx.clock, maxClock(working) + 1);
  for (const type of Array.from(types).sort()) {
    let run: { from: number; to: number; value: Value } | null = null;
    const flush = () => {
      if (!run) return;
      const start = ids[run.from];
      const end = ids[run.to];
      if (start !== undefined && end !== undefined) {
        ops.push({
          type: "mark",
          id: stampKey({ clock, actor: ctx.actor }),
          markType: type,
          value: run.value,
          start,
          end,
        });
        clock += 1;
      }
      run = null;
    };
    for (let i = 0; i < ids.length; i += 1) {
      const want = desired[i]?.get(type) ?? null;
      const have = formatValue(formats[i], type);
      if (valuesEqual(want, have)) {
        flush();
        continue;
      }
      if (run && valuesEqual(run.value, want)) {
        run.to = i;
        continue;
      }
      flush();
      run = { from: i, to: i, value: want };
    }
    flush();
  }
  return ops;
}
