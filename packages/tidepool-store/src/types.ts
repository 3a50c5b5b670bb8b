import type { ActorId, FieldOp, ValueObject } from "@tidepool/crdt";

export type DocumentRef = {
  namespace: string;
  id: string;
};

/** Materialised document: the nested object of every field's value. */
export type View = ValueObject;

export type DeltaOp = FieldOp & { path: string };

/**
 * One atomic write to one document. `seq` counts this actor's deltas to this
 * document (1, 2, 3, ...); `clock` is the writer's Lamport clock.
 */
export type Delta = {
  ref: DocumentRef;
  actor: ActorId;
  seq: number;
  clock: number;
  ops: DeltaOp[];
};

/** Per actor, the highest seq held without gaps. */
export type StateVector = Record<ActorId, number>;

/** `"local"` for writes made here, otherwise the peer a delta came from. */
export type DeltaOrigin = "local" | (string & {});

export function docKey(ref: DocumentRef): string {
  return `${ref.namespace}/${ref.id}`;
}

export function parseDocKey(key: string): DocumentRef {
  const slash = key.indexOf("/");
  if (slash <= 0 || slash === key.length - 1) throw new Error(`invalid document key: ${key}`);
  return { namespace: key.slice(0, slash), id: key.slice(slash + 1) };
}

export function deltaKey(actor: ActorId, seq: number): string {
  return `${actor}:${seq}`;
}

export function refsEqual(a: DocumentRef, b: DocumentRef): boolean {
  return a.namespace === b.namespace && a.id === b.id;
}
