import { DocumentStore, createLogger } from "@tidepool/store";

import {
  Committee,
  CommitteeMember,
  Ledger,
  ReconciliationEngine,
  createInProcessCommitteeChannel,
} from "../src/index.js";
import type { CommitteeVoter, InProcessCommitteeChannel, OverdraftPolicy } from "../src/index.js";

export const silent = createLogger({ level: "silent" });

export function makeStore(actor: string): DocumentStore {
  return new DocumentStore({ actor, logger: silent });
}

/** A ledger whose transaction ids are `${prefix}-1`, `${prefix}-2`, ... and whose clock is a counter. */
export function makeLedger(store: DocumentStore, prefix: string, clock: { t: number } = { t: 0 }): Ledger {
  let n = 0;
  return new Ledger({
    store,
    logger: silent,
    now: () => {
      clock.t += 100;
      return clock.t;
    },
    newTransactionId: () => {
      n += 1;
      return `${prefix}-${n}`;
    },
  });
}

/** Exchanges every delta the two stores are missing from each other. */
export function syncStores(a: DocumentStore, b: DocumentStore): void {
  for (const [from, to] of [
    [a, b],
    [b, a],
  ] as const) {
    for (const ref of from.refs()) {
      for (const delta of from.missingDeltas(ref, to.stateVector(ref))) {
        to.applyRemote(ref, delta, from.context.actor);
      }
    }
  }
}

export type Harness = {
  store: DocumentStore;
  ledger: Ledger;
  members: CommitteeMember[];
  committee: Committee;
  channel: InProcessCommitteeChannel;
  engine: ReconciliationEngine;
};

export const CONFIRMED_AT = 5000;

/**
 * A coordinator store plus a committee whose members share it. `extra`
 * voters join the committee with their own keys.
 */
export function makeHarness(
  opts: {
    members?: number;
    extra?: { voter: CommitteeVoter; publicKey: Uint8Array }[];
    overdraftPolicy?: OverdraftPolicy;
  } = {},
): Harness {
  const store = makeStore("coord");
  const ledger = makeLedger(store, "tx");
  const members = Array.from(
    { length: opts.members ?? 4 },
    (_, i) =>
      new CommitteeMember({ id: `m${i + 1}`, store, overdraftPolicy: opts.overdraftPolicy, logger: silent }),
  );
  const extra = opts.extra ?? [];
  const committee = new Committee([
    ...members.map((m) => m.info()),
    ...extra.map(({ voter, publicKey }) => ({ id: voter.id, publicKey })),
  ]);
  const channel = createInProcessCommitteeChannel([...members, ...extra.map((e) => e.voter)], { logger: silent });
  const engine = new ReconciliationEngine({
    store,
    committee,
    channel,
    voteTimeoutMs: 50,
    now: () => CONFIRMED_AT,
    overdraftPolicy: opts.overdraftPolicy,
    logger: silent,
  });
  return { store, ledger, members, committee, channel, engine };
}
