import type { FieldState, Value, ValueObject } from "@tidepool/crdt";
import { applyFieldOp, cloneField, emptyField, encodeCanonical, mergeField, readField } from "@tidepool/crdt";

import type { CompiledSchema } from "./schema.js";
import type { Delta, DocumentRef, StateVector, View } from "./types.js";
import { deltaKey } from "./types.js";

function setPath(target: ValueObject, path: string, value: Value): void {
  const segments = path.split(".");
  let node = target;
  for (const seg of segments.slice(0, -1)) {
    const next = node[seg];
    if (next !== null && typeof next === "object" && !Array.isArray(next) && !(next instanceof Uint8Array)) {
      node = next;
    } else {
      const created: ValueObject = {};
      node[seg] = created;
      node = created;
    }
  }
  const last = segments[segments.length - 1];
  if (last !== undefined) node[last] = value;
}

export function getPath(view: ValueObject, path: string): Value | undefined {
  let node: Value | undefined = view;
  for (const seg of path.split(".")) {
    if (node === null || node === undefined || typeof node !== "object" || Array.isArray(node) || node instanceof Uint8Array) {
      return undefined;
    }
    node = node[seg];
  }
  return node;
}

/**
 * One document: merged field states, the delta log arena keyed by
 * `actor:seq`, and the state vector the two cover.
 *
 * `base` is the part of history folded into the field states by compaction;
 * deltas at or below it are no longer in the log.
 */
export class StoredDocument {
  readonly fields = new Map<string, FieldState>();
  readonly log = new Map<string, Delta>();
  vector: StateVector = {};
  base: StateVector = {};
  /** Highest Lamport clock among the deltas this document has absorbed. */
  maxClock = 0;
  private cachedView: { view: View; bytes: Uint8Array } | null = null;

  constructor(
    readonly ref: DocumentRef,
    public schemaVersion: number,
  ) {}

  clone(): StoredDocument {
    const copy = new StoredDocument(this.ref, this.schemaVersion);
    for (const [path, state] of this.fields) copy.fields.set(path, cloneField(state));
    for (const [key, delta] of this.log) copy.log.set(key, delta);
    copy.vector = { ...this.vector };
    copy.base = { ...this.base };
    copy.maxClock = this.maxClock;
    copy.cachedView = this.cachedView;
    return copy;
  }

  field(schema: CompiledSchema, path: string): FieldState {
    const existing = this.fields.get(path);
    if (existing) return existing;
    const field = schema.field(path);
    if (!field) throw new Error(`unknown field ${path}`);
    return emptyField(field.strategy);
  }

  has(actor: string, seq: number): boolean {
    return seq <= (this.base[actor] ?? 0) || this.log.has(deltaKey(actor, seq));
  }

  /**
   * Merges the delta's ops into the field states. Touched fields are staged
   * on copies, so a failing op leaves the document unchanged.
   */
  applyOps(delta: Delta, schema: CompiledSchema): void {
    const staged = new Map<string, FieldState>();
    for (const op of delta.ops) {
      const field = schema.field(op.path);
      if (!field) throw new Error(`unknown field ${op.path}`);
      let state = staged.get(op.path);
      if (!state) {
        state = cloneField(this.fields.get(op.path) ?? emptyField(field.strategy));
        staged.set(op.path, state);
      }
      applyFieldOp(state, op, schema.fieldOptions(field));
    }
    for (const [path, state] of staged) this.fields.set(path, state);
    if (delta.clock > this.maxClock) this.maxClock = delta.clock;
    this.cachedView = null;
  }

  /** Merges another replica's field states into this one. */
  absorbFields(fields: ReadonlyMap<string, FieldState>, schema: CompiledSchema): void {
    for (const [path, state] of fields) {
      const field = schema.field(path);
      if (!field) throw new Error(`unknown field ${path}`);
      this.fields.set(path, mergeField(this.fields.get(path) ?? emptyField(field.strategy), state, schema.fieldOptions(field)));
    }
    this.cachedView = null;
  }

  /** Appends to the log and advances the contiguous vector for its actor. */
  record(delta: Delta): void {
    this.log.set(deltaKey(delta.actor, delta.seq), delta);
    this.advance(delta.actor);
  }

  private advance(actor: string): void {
    let seq = Math.max(this.vector[actor] ?? 0, this.base[actor] ?? 0);
    while (this.log.has(deltaKey(actor, seq + 1))) seq += 1;
    if (seq > 0) this.vector[actor] = seq;
  }

  /** Recomputes the vector from base and log. */
  reindex(): void {
    this.vector = {};
    const actors = new Set([...Object.keys(this.base), ...Array.from(this.log.values(), (d) => d.actor)]);
    for (const actor of actors) this.advance(actor);
  }

  nextSeq(actor: string): number {
    let seq = Math.max(this.vector[actor] ?? 0, this.base[actor] ?? 0) + 1;
    while (this.log.has(deltaKey(actor, seq))) seq += 1;
    return seq;
  }

  materialize(schema: CompiledSchema): { view: View; bytes: Uint8Array } {
    if (this.cachedView) return this.cachedView;
    const view: View = {};
    for (const field of schema.schema.fields) {
      const state = this.fields.get(field.path) ?? emptyField(field.strategy);
      setPath(view, field.path, readField(state, schema.fieldOptions(field)));
    }
    this.cachedView = { view, bytes: encodeCanonical(view) };
    return this.cachedView;
  }

  /** Log entries sorted by actor, then seq. */
  deltas(): Delta[] {
    return Array.from(this.log.values()).sort((a, b) =>
      a.actor === b.actor ? a.seq - b.seq : a.actor < b.actor ? -1 : 1,
    );
  }

  /** Drops log entries at or below `base`; they are already in the field states. */
  dropCovered(): void {
    for (const [key, delta] of this.log) {
      if (delta.seq <= (this.base[delta.actor] ?? 0)) this.log.delete(key);
    }
  }

  /** Folds the contiguous log into the field states and drops it. */
  compact(): number {
    let dropped = 0;
    for (const [key, delta] of this.log) {
      if (delta.seq <= (this.vector[delta.actor] ?? 0)) {
        this.log.delete(key);
        dropped += 1;
      }
    }
    this.base = { ...this.vector };
    return dropped;
  }
}
