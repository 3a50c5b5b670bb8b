import type { CrdtStrategy } from "@tidepool/crdt";
import type { Delta, DocumentRef, StateVector } from "@tidepool/store";
import { docKey } from "@tidepool/store";

import { positiveNumber } from "./util.js";

/** Strategies whose later op on the same path carries everything an earlier one did. */
const SUPERSEDABLE: ReadonlySet<CrdtStrategy> = new Set(["lww", "pn_counter", "immutable"]);

export type OutboundItem = {
  ref: DocumentRef;
  /** Coalesced predecessors, sent with their ops stripped so the peer's seq stays contiguous. */
  covers: Delta[];
  delta: Delta;
};

export type OutboundQueueOptions = {
  /** Depth past which coalescing and deferral start. Default 1000. */
  maxDepth?: number;
};

function supersedable(delta: Delta): boolean {
  return delta.ops.every((op) => SUPERSEDABLE.has(op.strategy));
}

function covers(later: Delta, earlier: Delta): boolean {
  if (later.actor !== earlier.actor || later.seq <= earlier.seq) return false;
  const paths = new Set(later.ops.map((op) => op.path));
  return earlier.ops.every((op) => paths.has(op.path));
}

function strip(delta: Delta): Delta {
  return { ...delta, ops: [] };
}

/**
 * Per-peer outbound deltas. Bounded by `maxDepth`: past it, the oldest
 * register/counter deltas fully overwritten by a later queued delta of the
 * same actor and document are folded into that delta, and deltas carrying
 * sequence/set/text/multi-value ops move to a deferred list that drains after
 * the main queue. Nothing is dropped.
 */
export class OutboundQueue {
  private readonly maxDepth: number;
  private main: OutboundItem[] = [];
  private deferred: OutboundItem[] = [];
  private coalescedCount = 0;

  constructor(opts: OutboundQueueOptions = {}) {
    this.maxDepth = positiveNumber(opts.maxDepth ?? 1000, "maxDepth");
  }

  get depth(): number {
    return this.main.length;
  }

  get deferredDepth(): number {
    return this.deferred.length;
  }

  get coalesced(): number {
    return this.coalescedCount;
  }

  get size(): number {
    return this.main.length + this.deferred.length;
  }

  push(delta: Delta): void {
    this.main.push({ ref: delta.ref, covers: [], delta });
    if (this.main.length > this.maxDepth) this.relieve();
  }

  /** Next item to send: main queue first, then deferred. */
  shift(): OutboundItem | undefined {
    return this.main.shift() ?? this.deferred.shift();
  }

  /** Drops deltas of the document `key` the peer reports holding. */
  prune(key: string, remote: StateVector): void {
    const held = (d: Delta) => d.seq <= (remote[d.actor] ?? 0);
    const keep = (item: OutboundItem): OutboundItem | null => {
      if (docKey(item.ref) !== key) return item;
      if (held(item.delta)) return null;
      return { ...item, covers: item.covers.filter((c) => !held(c)) };
    };
    this.main = this.main.map(keep).filter((item): item is OutboundItem => item !== null);
    this.deferred = this.deferred.map(keep).filter((item): item is OutboundItem => item !== null);
  }

  clear(): void {
    this.main = [];
    this.deferred = [];
  }

  private relieve(): void {
    for (let i = 0; i < this.main.length && this.main.length > this.maxDepth; ) {
      const item = this.main[i];
      if (!item) break;
      const key = docKey(item.ref);
      const target = supersedable(item.delta)
        ? this.main.find((later, j) => j > i && docKey(later.ref) === key && covers(later.delta, item.delta))
        : undefined;
      if (target) {
        target.covers.push(...item.covers, strip(item.delta));
        this.main.splice(i, 1);
        this.coalescedCount += 1;
        continue;
      }
      if (!supersedable(item.delta)) {
        this.deferred.push(item);
        this.main.splice(i, 1);
        continue;
      }
      i += 1;
    }
  }
}
