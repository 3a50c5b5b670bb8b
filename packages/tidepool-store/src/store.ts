import { compareBytes, encodeCanonical } from "@tidepool/crdt";

import { NodeContext } from "./context.js";
import { checkDeltaSchema } from "./delta.js";
import { StoredDocument, getPath } from "./document.js";
import { DeserializeCorruptionError, DocumentNotFoundError, SchemaError, TransactionAbortedError } from "./errors.js";
import type { Logger } from "./logger.js";
import { componentLogger } from "./logger.js";
import type { DocumentPersistence } from "./persistence.js";
import type { CompiledSchema, SchemaInput } from "./schema.js";
import { SchemaRegistry } from "./schema.js";
import { deserializeDocument, serializeDocument } from "./serialize.js";
import type { Mutator, StagedDocument, StagingHost } from "./transaction.js";
import { Transaction, stageCreation, stageMutation } from "./transaction.js";
import type { Delta, DeltaOrigin, DocumentRef, StateVector, View } from "./types.js";
import { docKey, refsEqual } from "./types.js";

export type DocumentStoreOptions = {
  /** Local writer identity; created from `actor` when omitted. */
  context?: NodeContext;
  actor?: string;
  logger?: Logger;
  persistence?: DocumentPersistence;
  schemas?: SchemaInput[];
};

export type SubscribeOptions = {
  /** Only fire when the value under this dotted path changed. */
  path?: string;
};

export type Subscriber = (view: View, ref: DocumentRef) => void;
export type DeltaListener = (delta: Delta, origin: DeltaOrigin) => void;

type Subscription = { callback: Subscriber; path?: string };

function encodedAt(view: View | undefined, path: string): Uint8Array {
  const value = view ? getPath(view, path) : undefined;
  return encodeCanonical(value ?? null);
}

/**
 * Owns every local document. Local writes, remote deltas and snapshot imports
 * all go through here; each commit is persisted (when a persistence adapter is
 * set) before subscribers and delta listeners hear about it.
 */
export class DocumentStore implements StagingHost {
  readonly context: NodeContext;
  readonly schemas = new SchemaRegistry();
  /** Documents that failed to load from persistence. */
  readonly loadErrors: DeserializeCorruptionError[] = [];

  private readonly docs = new Map<string, StoredDocument>();
  private readonly subscriptions = new Map<string, Set<Subscription>>();
  private readonly deltaListeners = new Set<DeltaListener>();
  private readonly persistence: DocumentPersistence | undefined;
  private readonly log: Logger;
  private inTransaction = false;

  constructor(opts: DocumentStoreOptions = {}) {
    this.context = opts.context ?? new NodeContext({ actor: opts.actor });
    this.persistence = opts.persistence;
    this.log = componentLogger(opts.logger, "store").child({ actor: this.context.actor });
    for (const schema of opts.schemas ?? []) this.schemas.register(schema);
  }

  /**
   * Creates a store and loads every document the persistence adapter holds.
   * A document that fails to load is reported in `loadErrors` and skipped.
   */
  static open(opts: DocumentStoreOptions & { persistence: DocumentPersistence }): DocumentStore {
    const store = new DocumentStore(opts);
    store.loadAll(opts.persistence);
    return store;
  }

  private loadAll(persistence: DocumentPersistence): void {
    const started = Date.now();
    for (const key of persistence.keys()) {
      const bytes = persistence.load(key);
      if (!bytes) continue;
      try {
        const doc = deserializeDocument(bytes, this.schemas, key);
        if (docKey(doc.ref) !== key) throw new DeserializeCorruptionError(key, `stored under the wrong key`);
        this.docs.set(key, doc);
        this.context.observe(doc.maxClock);
      } catch (err) {
        if (!(err instanceof DeserializeCorruptionError)) throw err;
        this.loadErrors.push(err);
        this.log.error({ key, err: err.message }, "skipping corrupted document");
      }
    }
    this.log.info({ documents: this.docs.size, failed: this.loadErrors.length, ms: Date.now() - started }, "loaded");
  }

  registerSchema(input: SchemaInput): CompiledSchema {
    return this.schemas.register(input);
  }

  document(key: string): StoredDocument | undefined {
    return this.docs.get(key);
  }

  has(ref: DocumentRef): boolean {
    return this.docs.has(docKey(ref));
  }

  refs(namespace?: string): DocumentRef[] {
    const out: DocumentRef[] = [];
    for (const doc of this.docs.values()) {
      if (namespace === undefined || doc.ref.namespace === namespace) out.push({ ...doc.ref });
    }
    return out.sort((a, b) => (docKey(a) < docKey(b) ? -1 : docKey(a) > docKey(b) ? 1 : 0));
  }

  private assertIdle(op: string) {
    if (this.inTransaction) throw new Error(`${op} called while a transaction is open; use the transaction handle`);
  }

  /** Creates the document (or overlays `initial` on an existing one). */
  create(namespace: string, id: string, initial: View = {}): DocumentRef {
    this.assertIdle("create");
    const ref = { namespace, id };
    const schema = this.schemas.require(namespace);
    const existing = this.docs.get(docKey(ref));
    const staged: StagedDocument = existing
      ? { doc: existing.clone(), schema, before: existing.materialize(schema), deltas: [] }
      : { doc: new StoredDocument(ref, schema.version), schema, before: null, deltas: [] };
    stageCreation(staged, this.context, initial);
    this.commit([staged], "local");
    return ref;
  }

  read(ref: DocumentRef): View {
    const doc = this.requireDoc(ref);
    return structuredClone(doc.materialize(this.schemas.require(ref.namespace)).view);
  }

  tryRead(ref: DocumentRef): View | undefined {
    return this.has(ref) ? this.read(ref) : undefined;
  }

  /**
   * Applies `fn` to a copy of the current view and records the difference as
   * one delta. Returns `null` when nothing changed. Errors leave the document
   * untouched.
   */
  mutate(ref: DocumentRef, fn: Mutator): Delta | null {
    this.assertIdle("mutate");
    const doc = this.requireDoc(ref);
    const schema = this.schemas.require(ref.namespace);
    const staged: StagedDocument = { doc: doc.clone(), schema, before: doc.materialize(schema), deltas: [] };
    const delta = stageMutation(staged, this.context, fn);
    if (!delta) return null;
    this.commit([staged], "local");
    return delta;
  }

  /**
   * All-or-nothing batch across documents. A throwing body applies nothing
   * and surfaces as `TransactionAbortedError` with the original error as
   * `cause`.
   */
  transaction<T>(fn: (tx: Transaction) => T): T {
    this.assertIdle("transaction");
    const tx = new Transaction(this);
    let result: T;
    this.inTransaction = true;
    try {
      result = fn(tx);
      if (result instanceof Promise) throw new Error("transaction bodies must be synchronous");
    } catch (err) {
      tx.finish();
      this.log.debug({ err: err instanceof Error ? err.message : String(err) }, "transaction aborted");
      throw new TransactionAbortedError(err);
    } finally {
      this.inTransaction = false;
    }
    this.commit(tx.finish(), "local");
    return result;
  }

  /**
   * Merges a delta produced elsewhere. Returns `false` when it was already
   * held (or targets a namespace this node does not know).
   */
  applyRemote(ref: DocumentRef, delta: Delta, origin: DeltaOrigin = "remote"): boolean {
    this.assertIdle("applyRemote");
    const key = docKey(ref);
    const schema = this.checkRemote(ref, delta);
    if (!schema) {
      this.log.warn({ doc: key, origin }, "ignoring delta for unknown namespace");
      return false;
    }

    const existing = this.docs.get(key);
    if (existing?.has(delta.actor, delta.seq)) return false;

    const doc = existing ? existing.clone() : new StoredDocument({ ...ref }, schema.version);
    const before = existing ? existing.materialize(schema) : null;
    doc.applyOps(delta, schema);
    doc.record(delta);
    this.context.observe(delta.clock);
    this.commit([{ doc, schema, before, deltas: [delta] }], origin);
    return true;
  }

  /**
   * Checks a remote delta against the registered schema without applying it.
   * Returns `null` for a namespace this node does not know.
   */
  checkRemote(ref: DocumentRef, delta: Delta): CompiledSchema | null {
    if (!refsEqual(ref, delta.ref)) {
      throw new SchemaError(`delta for ${docKey(delta.ref)} applied to ${docKey(ref)}`);
    }
    const schema = this.schemas.get(ref.namespace);
    if (!schema) return null;
    checkDeltaSchema(delta, schema);
    return schema;
  }

  subscribe(ref: DocumentRef, callback: Subscriber, opts: SubscribeOptions = {}): () => void {
    const key = docKey(ref);
    let set = this.subscriptions.get(key);
    if (!set) {
      set = new Set();
      this.subscriptions.set(key, set);
    }
    const sub: Subscription = opts.path ? { callback, path: opts.path } : { callback };
    set.add(sub);
    return () => {
      const current = this.subscriptions.get(key);
      if (!current) return;
      current.delete(sub);
      if (current.size === 0) this.subscriptions.delete(key);
    };
  }

  /** Every committed delta, local or remote, in commit order. */
  onDelta(listener: DeltaListener): () => void {
    this.deltaListeners.add(listener);
    return () => {
      this.deltaListeners.delete(listener);
    };
  }

  stateVector(ref: DocumentRef): StateVector {
    const doc = this.docs.get(docKey(ref));
    return doc ? { ...doc.vector } : {};
  }

  stateVectors(): Record<string, StateVector> {
    const out: Record<string, StateVector> = {};
    for (const [key, doc] of this.docs) out[key] = { ...doc.vector };
    return out;
  }

  /** Deltas held here that a replica at `remote` lacks, by actor then seq. */
  missingDeltas(ref: DocumentRef, remote: StateVector): Delta[] {
    const doc = this.docs.get(docKey(ref));
    if (!doc) return [];
    return doc.deltas().filter((d) => d.seq > (remote[d.actor] ?? 0));
  }

  /** True when compaction dropped deltas a replica at `remote` still needs. */
  needsSnapshot(ref: DocumentRef, remote: StateVector): boolean {
    const doc = this.docs.get(docKey(ref));
    if (!doc) return false;
    return Object.entries(doc.base).some(([actor, seq]) => (remote[actor] ?? 0) < seq);
  }

  exportSnapshot(ref: DocumentRef): Uint8Array {
    return serializeDocument(this.requireDoc(ref));
  }

  /**
   * Merges a serialized replica of a document into the local one. Returns
   * whether the local view changed.
   */
  importSnapshot(bytes: Uint8Array, origin: DeltaOrigin = "remote"): boolean {
    this.assertIdle("importSnapshot");
    const incoming = deserializeDocument(bytes, this.schemas, "snapshot");
    const key = docKey(incoming.ref);
    const schema = this.schemas.require(incoming.ref.namespace);
    const existing = this.docs.get(key);
    this.context.observe(incoming.maxClock);

    let doc = incoming;
    let before: StagedDocument["before"] = null;
    if (existing) {
      before = existing.materialize(schema);
      doc = existing.clone();
      doc.absorbFields(incoming.fields, schema);
      for (const [k, delta] of incoming.log) if (!doc.log.has(k)) doc.log.set(k, delta);
      for (const [actor, seq] of Object.entries(incoming.base)) {
        if (seq > (doc.base[actor] ?? 0)) doc.base[actor] = seq;
      }
      doc.maxClock = Math.max(doc.maxClock, incoming.maxClock);
      doc.dropCovered();
      doc.reindex();
    }
    this.commit([{ doc, schema, before, deltas: [] }], origin);
    const after = doc.materialize(schema);
    return !before || compareBytes(before.bytes, after.bytes) !== 0;
  }

  /** Folds the document's log into its snapshot. Returns the number of deltas dropped. */
  compact(ref: DocumentRef): number {
    this.assertIdle("compact");
    const doc = this.requireDoc(ref);
    const schema = this.schemas.require(ref.namespace);
    const compacted = doc.clone();
    const dropped = compacted.compact();
    this.commit([{ doc: compacted, schema, before: doc.materialize(schema), deltas: [] }], "local");
    this.log.info({ doc: docKey(ref), dropped }, "compacted");
    return dropped;
  }

  close(): void {
    this.deltaListeners.clear();
    this.subscriptions.clear();
    this.persistence?.close?.();
  }

  private requireDoc(ref: DocumentRef): StoredDocument {
    const key = docKey(ref);
    const doc = this.docs.get(key);
    if (!doc) throw new DocumentNotFoundError(key);
    return doc;
  }

  private commit(staged: StagedDocument[], origin: DeltaOrigin): void {
    this.persistence?.save(staged.map((s) => ({ key: docKey(s.doc.ref), bytes: serializeDocument(s.doc) })));
    for (const s of staged) this.docs.set(docKey(s.doc.ref), s.doc);

    for (const s of staged) {
      for (const delta of s.deltas) {
        this.log.debug({ doc: docKey(delta.ref), actor: delta.actor, seq: delta.seq, origin }, "delta committed");
        for (const listener of Array.from(this.deltaListeners)) {
          try {
            listener(delta, origin);
          } catch (err) {
            this.log.error({ err: err instanceof Error ? err.message : String(err) }, "delta listener threw");
          }
        }
      }
    }
    for (const s of staged) this.notify(s);
  }

  private notify(staged: StagedDocument): void {
    const key = docKey(staged.doc.ref);
    const subs = this.subscriptions.get(key);
    if (!subs || subs.size === 0) return;
    const after = staged.doc.materialize(staged.schema);
    const before = staged.before;
    if (before && compareBytes(before.bytes, after.bytes) === 0) return;

    for (const sub of Array.from(subs)) {
      if (sub.path && compareBytes(encodedAt(before?.view, sub.path), encodedAt(after.view, sub.path)) === 0) {
        continue;
      }
      try {
        sub.callback(structuredClone(after.view), { ...staged.doc.ref });
      } catch (err) {
        this.log.error({ doc: key, err: err instanceof Error ? err.message : String(err) }, "subscriber threw");
      }
    }
  }
}
