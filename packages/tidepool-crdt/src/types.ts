export type ActorId = string;

/**
 * Any value a field can hold. Values are plain data so that they encode
 * deterministically (see `encodeValue`).
 */
export type Value =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | Value[]
  | { [key: string]: Value };

export type ValueObject = { [key: string]: Value };

/**
 * `(clock, actor)` pair tagging every write. Ordered lexicographically.
 */
export type Stamp = {
  clock: number;
  actor: ActorId;
};

export const CRDT_STRATEGIES = [
  "immutable",
  "lww",
  "or_set",
  "pn_counter",
  "rga",
  "mv_register",
  "peritext",
] as const;

export type CrdtStrategy = (typeof CRDT_STRATEGIES)[number];

export function isCrdtStrategy(value: unknown): value is CrdtStrategy {
  return typeof value === "string" && CRDT_STRATEGIES.some((s) => s === value);
}

export type NumericBound = {
  min?: number;
  max?: number;
};

/**
 * Identity of the writer producing ops. `clock` is the Lamport clock of the
 * delta the ops belong to.
 */
export type OpContext = {
  actor: ActorId;
  clock: number;
};

export type FieldOptions = {
  bound?: NumericBound;
  path?: string;
};

export function compareStamps(a: Stamp, b: Stamp): number {
  if (a.clock !== b.clock) return a.clock < b.clock ? -1 : 1;
  if (a.actor === b.actor) return 0;
  return a.actor < b.actor ? -1 : 1;
}

export function stampKey(stamp: Stamp): string {
  return `${stamp.clock}@${stamp.actor}`;
}

export function parseStampKey(key: string): Stamp {
  const at = key.indexOf("@");
  if (at <= 0) throw new Error(`invalid stamp key: ${key}`);
  const clock = Number(key.slice(0, at));
  if (!Number.isSafeInteger(clock) || clock < 0) throw new Error(`invalid stamp key: ${key}`);
  return { clock, actor: key.slice(at + 1) };
}

export function compareStampKeys(a: string, b: string): number {
  return compareStamps(parseStampKey(a), parseStampKey(b));
}

export function clampToBound(value: number, bound: NumericBound | undefined): number {
  if (!bound) return value;
  if (bound.min !== undefined && value < bound.min) return bound.min;
  if (bound.max !== undefined && value > bound.max) return bound.max;
  return value;
}

export function withinBound(value: number, bound: NumericBound | undefined): boolean {
  return clampToBound(value, bound) === value;
}
