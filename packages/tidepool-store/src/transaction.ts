import type { ValueObject } from "@tidepool/crdt";
import { InvalidValueError, diffField, emptyField, isValue, isValueObject } from "@tidepool/crdt";

import type { NodeContext } from "./context.js";
import { StoredDocument } from "./document.js";
import { DocumentNotFoundError, SchemaError } from "./errors.js";
import type { CompiledSchema, SchemaRegistry } from "./schema.js";
import type { Delta, DeltaOp, DocumentRef, View } from "./types.js";
import { docKey } from "./types.js";

export type Mutator = (view: View) => View;

/** A document copy with the writes made to it but not yet committed. */
export type StagedDocument = {
  doc: StoredDocument;
  schema: CompiledSchema;
  /** View before the first staged write; `null` for a new document. */
  before: { view: View; bytes: Uint8Array } | null;
  deltas: Delta[];
};

/** What a transaction needs from the store. */
export interface StagingHost {
  readonly schemas: SchemaRegistry;
  readonly context: NodeContext;
  document(key: string): StoredDocument | undefined;
}

function diffView(staged: StagedDocument, context: NodeContext, fn: Mutator): { clock: number; ops: DeltaOp[] } {
  const { doc, schema } = staged;
  const current = doc.materialize(schema).view;
  const next: unknown = fn(structuredClone(current));
  if (!isValueObject(next)) throw new SchemaError(`${docKey(doc.ref)}: mutate must return an object view`);

  const assigned = schema.flatten(next);
  const clock = context.tick();
  const ctx = { actor: context.actor, clock };
  const ops: DeltaOp[] = [];
  for (const [path, value] of assigned) {
    const field = schema.field(path);
    if (!field) continue;
    if (!isValue(value)) throw new SchemaError(`${docKey(doc.ref)}.${path}: not a plain data value`);
    const state = doc.fields.get(path) ?? emptyField(field.strategy);
    try {
      for (const op of diffField(state, value, ctx, schema.fieldOptions(field))) ops.push({ ...op, path });
    } catch (err) {
      if (err instanceof InvalidValueError) {
        throw new SchemaError(`${docKey(doc.ref)}.${path}: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
  return { clock, ops };
}

function recordDelta(staged: StagedDocument, context: NodeContext, clock: number, ops: DeltaOp[]): Delta {
  const { doc, schema } = staged;
  const delta: Delta = { ref: doc.ref, actor: context.actor, seq: doc.nextSeq(context.actor), clock, ops };
  doc.applyOps(delta, schema);
  doc.record(delta);
  staged.deltas.push(delta);
  return delta;
}

/**
 * Runs `fn` against the staged document and records the resulting delta on it.
 * Returns `null` when the new view equals the old one.
 */
export function stageMutation(staged: StagedDocument, context: NodeContext, fn: Mutator): Delta | null {
  const { clock, ops } = diffView(staged, context, fn);
  if (ops.length === 0) return null;
  return recordDelta(staged, context, clock, ops);
}

/**
 * Overlays `initial` on the staged document. A document new to this node
 * always records a delta, with no ops when `initial` leaves every field at
 * its default, so peers learn that it exists.
 */
export function stageCreation(staged: StagedDocument, context: NodeContext, initial: View): void {
  const { clock, ops } = diffView(staged, context, overlay(initial));
  const isNew = staged.before === null && staged.deltas.length === 0;
  if (ops.length > 0 || isNew) recordDelta(staged, context, clock, ops);
}

function mergeInto(target: ValueObject, patch: ValueObject): ValueObject {
  for (const [key, value] of Object.entries(patch)) {
    const existing = target[key];
    if (isValueObject(existing) && isValueObject(value)) mergeInto(existing, value);
    else target[key] = value;
  }
  return target;
}

/** Mutator that overlays `initial` on the current view. */
export function overlay(initial: View): Mutator {
  return (view) => mergeInto(view, structuredClone(initial));
}

/**
 * Handle passed to a transaction body. Writes land on document copies; the
 * store applies them all at commit or none of them.
 */
export class Transaction {
  private readonly staged = new Map<string, StagedDocument>();
  private closed = false;

  constructor(private readonly host: StagingHost) {}

  private assertOpen() {
    if (this.closed) throw new Error("transaction is already finished");
  }

  private stage(ref: DocumentRef, create: boolean): StagedDocument {
    const key = docKey(ref);
    const existing = this.staged.get(key);
    if (existing) return existing;
    const schema = this.host.schemas.require(ref.namespace);
    const doc = this.host.document(key);
    let staged: StagedDocument;
    if (doc) {
      staged = { doc: doc.clone(), schema, before: doc.materialize(schema), deltas: [] };
    } else {
      if (!create) throw new DocumentNotFoundError(key);
      staged = { doc: new StoredDocument({ ...ref }, schema.version), schema, before: null, deltas: [] };
    }
    this.staged.set(key, staged);
    return staged;
  }

  create(namespace: string, id: string, initial: View = {}): DocumentRef {
    this.assertOpen();
    const ref = { namespace, id };
    stageCreation(this.stage(ref, true), this.host.context, initial);
    return ref;
  }

  read(ref: DocumentRef): View {
    this.assertOpen();
    const key = docKey(ref);
    const staged = this.staged.get(key);
    if (staged) return structuredClone(staged.doc.materialize(staged.schema).view);
    const doc = this.host.document(key);
    if (!doc) throw new DocumentNotFoundError(key);
    return structuredClone(doc.materialize(this.host.schemas.require(ref.namespace)).view);
  }

  has(ref: DocumentRef): boolean {
    const key = docKey(ref);
    return this.staged.has(key) || this.host.document(key) !== undefined;
  }

  mutate(ref: DocumentRef, fn: Mutator): Delta | null {
    this.assertOpen();
    return stageMutation(this.stage(ref, false), this.host.context, fn);
  }

  /** Ends the transaction and hands over what it staged. */
  finish(): StagedDocument[] {
    this.closed = true;
    return Array.from(this.staged.values());
  }
}
