import { DocumentStore, createLogger } from "@tidepool/store";
import type { Delta, SchemaInput, View } from "@tidepool/store";

import { PeerManager } from "../src/index.js";
import type { InMemoryNetwork, PeerSessionOptions } from "../src/index.js";

export const NOTES: SchemaInput = {
  namespace: "notes",
  version: 1,
  fields: [
    { path: "title", type: "string", strategy: "lww" },
    { path: "tags", type: "string[]", strategy: "or_set" },
    { path: "likes", type: "int", strategy: "pn_counter", bound: { min: 0 } },
    { path: "body", type: "string[]", strategy: "rga" },
  ],
};

export const silent = createLogger({ level: "silent" });

export const FAST: PeerSessionOptions = {
  heartbeatMs: 25,
  peerTimeoutMs: 150,
  backoff: { baseDelayMs: 10, maxDelayMs: 50 },
};

export type Node = {
  id: string;
  store: DocumentStore;
  manager: PeerManager;
  stop: () => void;
};

export function makeNode(network: InMemoryNetwork, id: string, session: PeerSessionOptions = FAST): Node {
  const store = new DocumentStore({ actor: id, logger: silent, schemas: [NOTES] });
  const manager = new PeerManager({
    store,
    dialer: network.dialer(id),
    discovery: network.discovery(id),
    logger: silent,
    session,
  });
  const unlisten = network.listen(id, (peerId, transport) => {
    manager.accept(peerId, transport);
  });
  return {
    id,
    store,
    manager,
    stop: () => {
      unlisten();
      manager.close();
    },
  };
}

export async function waitFor(cond: () => boolean, timeoutMs = 5_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!cond()) {
    if (Date.now() > deadline) throw new Error("timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export function steady(node: Node, peerId: string): boolean {
  return node.manager.session(peerId)?.state === "steady";
}

export function readOr(node: Node, ref: { namespace: string; id: string }): View | undefined {
  return node.store.tryRead(ref);
}

export function delta(actor: string, seq: number, ops: Delta["ops"], id = "n1"): Delta {
  return { ref: { namespace: "notes", id }, actor, seq, clock: seq, ops };
}

export function titleOp(actor: string, clock: number, value: string): Delta["ops"][number] {
  return { path: "title", strategy: "lww", op: { type: "set", value, stamp: { clock, actor } } };
}

export function bodyOp(actor: string, clock: number, value: string): Delta["ops"][number] {
  return {
    path: "body",
    strategy: "rga",
    op: { type: "insert", elements: [{ id: `${clock}@${actor}`, left: null, value }] },
  };
}
