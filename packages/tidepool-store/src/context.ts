import { randomUUID } from "node:crypto";

import type { ActorId } from "@tidepool/crdt";

/**
 * Identity and Lamport clock of one local writer. Passed explicitly to the
 * store; there is no process-wide actor.
 */
export class NodeContext {
  readonly actor: ActorId;
  private clockValue: number;

  constructor(opts: { actor?: ActorId; clock?: number } = {}) {
    const actor = opts.actor ?? randomActorId();
    if (actor.length === 0 || actor.includes("@") || actor.includes(":")) {
      throw new Error(`invalid actor id: ${JSON.stringify(actor)}`);
    }
    const clock = opts.clock ?? 0;
    if (!Number.isSafeInteger(clock) || clock < 0) throw new Error(`invalid clock: ${opts.clock}`);
    this.actor = actor;
    this.clockValue = clock;
  }

  get clock(): number {
    return this.clockValue;
  }

  /** Advances and returns the clock for a new local write. */
  tick(): number {
    this.clockValue += 1;
    return this.clockValue;
  }

  /** Moves the clock past a clock seen on a remote write. */
  observe(clock: number): void {
    if (clock > this.clockValue) this.clockValue = clock;
  }
}

export function randomActorId(): ActorId {
  return randomUUID().replace(/-/g, "").slice(0, 16);
}
