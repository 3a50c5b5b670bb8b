import { expect, test } from "vitest";

import { encodeCanonical } from "@tidepool/crdt";

import { createCborSyncCodec, createInMemoryDuplex, createInMemoryNetwork } from "../src/index.js";
import type { PeerState, SyncMessage } from "../src/index.js";
import { FAST, delta, makeNode, steady, titleOp, waitFor } from "./helpers.js";
import type { Node } from "./helpers.js";

const n1 = { namespace: "notes", id: "n1" };
const n2 = { namespace: "notes", id: "n2" };

function converged(nodes: Node[], ref: { namespace: string; id: string }): boolean {
  const views = nodes.map((n) => n.store.tryRead(ref));
  if (views.some((v) => v === undefined)) return false;
  const first = JSON.stringify(views[0]);
  return views.every((v) => JSON.stringify(v) === first);
}

test("handshake streams what each side is missing, then steady state forwards new deltas", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A");
  const b = makeNode(network, "B");
  try {
    a.store.create("notes", "n1", { title: "from a", body: ["x"] });
    b.store.create("notes", "n2", { tags: ["b"] });

    a.manager.connect("B");
    await waitFor(() => steady(a, "B") && steady(b, "A"));
    await waitFor(() => a.store.has(n2) && b.store.has(n1));
    expect(b.store.read(n1)).toEqual(a.store.read(n1));
    expect(a.store.read(n2)).toEqual(b.store.read(n2));

    a.store.mutate(n1, (v) => ({ ...v, likes: 3 }));
    await waitFor(() => b.store.read(n1).likes === 3);
    expect(b.store.stateVector(n1)).toEqual({ A: 2 });

    const info = a.manager.peers();
    expect(info).toHaveLength(1);
    expect(info[0]).toMatchObject({ peerId: "B", state: "steady", dialing: true, lastError: null });
    expect(info[0]?.stats.deltasSent).toBe(2);
    expect(info[0]?.stats.deltasReceived).toBe(1);
    expect(info[0]?.stats.bytesSent).toBeGreaterThan(0);
  } finally {
    a.stop();
    b.stop();
  }
});

test("concurrent offline edits converge through a relaying peer", async () => {
  const network = createInMemoryNetwork();
  const [a, b, c] = ["A", "B", "C"].map((id) => makeNode(network, id));
  if (!a || !b || !c) throw new Error("nodes missing");
  try {
    a.store.create("notes", "n1", { title: "a", likes: 1, body: ["a"] });
    b.store.create("notes", "n1", { title: "b", likes: 2 });
    c.store.create("notes", "n1", { tags: ["c"], likes: 4 });

    a.manager.connect("B");
    c.manager.connect("B");
    await waitFor(() => converged([a, b, c], n1) && a.store.read(n1).likes === 7);

    expect(c.store.read(n1)).toEqual({ title: "b", tags: ["c"], likes: 7, body: ["a"] });
    expect(a.manager.session("C")).toBeUndefined();

    c.store.mutate(n1, (v) => ({ ...v, body: ["a", "c"] }));
    await waitFor(() => converged([a, b, c], n1) && JSON.stringify(a.store.read(n1).body) === '["a","c"]');
  } finally {
    for (const n of [a, b, c]) n.stop();
  }
});

test("a 3/2 partition converges per side, then everywhere after healing", async () => {
  const network = createInMemoryNetwork();
  const ids = ["n1", "n2", "n3", "n4", "n5"];
  const nodes = ids.map((id) => makeNode(network, id));
  const shared = { namespace: "notes", id: "shared" };
  try {
    for (let i = 0; i < nodes.length; i += 1) {
      for (let j = i + 1; j < nodes.length; j += 1) {
        const peer = ids[j];
        if (peer) nodes[i]?.manager.connect(peer);
      }
    }
    await waitFor(() => nodes.every((n) => ids.every((id) => id === n.id || steady(n, id))));

    nodes[0]?.store.create("notes", "shared", { title: "start" });
    await waitFor(() => converged(nodes, shared));

    network.partition([
      ["n1", "n2", "n3"],
      ["n4", "n5"],
    ]);
    for (const node of nodes) {
      node.store.mutate(shared, (v) => ({
        ...v,
        likes: Number(v.likes) + 1,
        tags: [...(Array.isArray(v.tags) ? v.tags : []), node.id],
      }));
    }

    const left = nodes.slice(0, 3);
    const right = nodes.slice(3);
    await waitFor(
      () =>
        converged(left, shared) &&
        converged(right, shared) &&
        left[0]?.store.read(shared).likes === 3 &&
        right[0]?.store.read(shared).likes === 2,
    );
    expect(left[0]?.store.read(shared).tags).toEqual(["n1", "n2", "n3"]);
    expect(right[0]?.store.read(shared).tags).toEqual(["n4", "n5"]);

    network.heal();
    await waitFor(() => converged(nodes, shared) && nodes[0]?.store.read(shared).likes === 5, 10_000);
    expect(nodes[4]?.store.read(shared)).toEqual({
      title: "start",
      tags: ["n1", "n2", "n3", "n4", "n5"],
      likes: 5,
      body: [],
    });
  } finally {
    for (const n of nodes) n.stop();
  }
}, 20_000);

test("silence past the peer timeout marks the session partitioned and it redials after healing", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A");
  const b = makeNode(network, "B");
  try {
    const session = a.manager.connect("B");
    const states: PeerState[] = [];
    session.onStateChange((state) => states.push(state));
    await waitFor(() => steady(a, "B"));

    network.partition([["A"], ["B"]]);
    await waitFor(() => states.includes("partitioned"));
    b.store.create("notes", "n1", { title: "written during the split" });

    network.heal();
    await waitFor(() => a.store.tryRead(n1)?.title === "written during the split");
    expect(states.slice(0, 5)).toEqual(["handshaking", "syncing", "steady", "partitioned", "reconnecting"]);
    expect(session.stats.reconnects).toBeGreaterThanOrEqual(1);
  } finally {
    a.stop();
    b.stop();
  }
});

test("transient dial failures back off and retry until the peer appears", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A");
  let b: Node | undefined;
  try {
    const session = a.manager.connect("B");
    await waitFor(() => session.stats.failedDials >= 2);
    expect(session.state).toBe("reconnecting");

    b = makeNode(network, "B");
    await waitFor(() => session.state === "steady" && b?.manager.session("A")?.state === "steady");
    expect(session.stats.failedDials).toBeGreaterThanOrEqual(2);
  } finally {
    a.stop();
    b?.stop();
  }
});

test("a session gives up after maxAttempts redials", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A", { ...FAST, backoff: { baseDelayMs: 5, maxDelayMs: 5, maxAttempts: 2 } });
  try {
    const session = a.manager.connect("ghost");
    const states: PeerState[] = [];
    session.onStateChange((state) => states.push(state));
    await waitFor(() => session.state === "closed");
    expect(states).toEqual(["disconnected", "reconnecting", "closed"]);
    expect(session.closeReason).toBe("gave-up");
    expect(session.stats.failedDials).toBe(3);
    expect(session.stats.reconnects).toBe(2);
    expect(a.manager.session("ghost")).toBeUndefined();
  } finally {
    a.stop();
  }
});

test("disconnect closes both ends and the accepting side forgets the peer", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A");
  const b = makeNode(network, "B");
  try {
    a.manager.connect("B");
    await waitFor(() => steady(a, "B") && steady(b, "A"));
    a.manager.disconnect("B");
    expect(a.manager.peers()).toEqual([]);
    await waitFor(() => b.manager.session("A") === undefined);
    expect(network.linkCount).toBe(0);
  } finally {
    a.stop();
    b.stop();
  }
});

function rogue(a: Node) {
  const codec = createCborSyncCodec();
  const [rogueEnd, nodeEnd] = createInMemoryDuplex<Uint8Array>();
  const received: SyncMessage[] = [];
  let closed = false;
  rogueEnd.onMessage((bytes) => received.push(codec.decode(bytes)));
  rogueEnd.onClose?.(() => {
    closed = true;
  });
  const session = a.manager.accept("R", nodeEnd);
  return {
    session,
    received,
    isClosed: () => closed,
    send: (msg: SyncMessage) => rogueEnd.send(codec.encode(msg)),
    sendRaw: (bytes: Uint8Array) => rogueEnd.send(bytes),
  };
}

test("a batch with a strategy mismatch is discarded whole and the peer is dropped", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A");
  try {
    const r = rogue(a);
    await r.send({ v: 1, payload: { case: "handshake", value: { nodeId: "R", stateVector: {} } } });
    await r.send({
      v: 1,
      payload: {
        case: "deltaBatch",
        value: {
          ref: n1,
          deltas: [
            delta("R", 1, [titleOp("R", 1, "fine")]),
            delta("R", 2, [{ path: "likes", strategy: "lww", op: { type: "set", value: 5, stamp: { clock: 2, actor: "R" } } }]),
          ],
        },
      },
    });
    await waitFor(r.isClosed);

    expect(r.session?.state).toBe("closed");
    expect(r.session?.closeReason).toBe("violation");
    expect(a.store.has(n1)).toBe(false);
    const error = r.received.find((m) => m.payload.case === "error");
    expect(error?.payload).toEqual({
      case: "error",
      value: {
        code: "PROTOCOL_VIOLATION",
        message: "rejected delta batch for notes/n1: notes.likes: delta carries a lww op for a pn_counter field",
      },
    });

    const [, again] = createInMemoryDuplex<Uint8Array>();
    expect(a.manager.accept("R", again)).toBeNull();
    expect(a.manager.peers()[0]).toMatchObject({ peerId: "R", state: "closed" });
  } finally {
    a.stop();
  }
});

test("unknown strategies and undecodable frames are protocol violations", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A");
  const b = makeNode(network, "B");
  try {
    const first = rogue(a);
    await first.sendRaw(
      encodeCanonical({
        v: 1,
        payload: {
          case: "deltaBatch",
          value: {
            ref: n1,
            deltas: [{ ref: n1, actor: "R", seq: 1, clock: 1, ops: [{ path: "likes", strategy: "gcounter", op: {} }] }],
          },
        },
      }),
    );
    await waitFor(first.isClosed);
    expect(first.session?.closeReason).toBe("violation");
    expect(a.store.has(n1)).toBe(false);

    const second = rogue(b);
    await second.sendRaw(Uint8Array.from([0xff]));
    await waitFor(second.isClosed);
    expect(second.session?.closeReason).toBe("violation");
    expect(second.session?.lastError?.message).toBe("sync frame is not valid CBOR");
  } finally {
    a.stop();
    b.stop();
  }
});

test("a handshake naming another node is refused", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A");
  try {
    const r = rogue(a);
    await r.send({ v: 1, payload: { case: "handshake", value: { nodeId: "Mallory", stateVector: {} } } });
    await waitFor(r.isClosed);
    expect(r.session?.lastError?.message).toBe("handshake from Mallory, expected R");
  } finally {
    a.stop();
  }
});

test("peers behind a compacted log receive a snapshot", async () => {
  const network = createInMemoryNetwork();
  const a = makeNode(network, "A");
  const b = makeNode(network, "B");
  try {
    a.store.create("notes", "n1", { title: "one" });
    a.store.mutate(n1, (v) => ({ ...v, likes: 2 }));
    a.store.compact(n1);

    a.manager.connect("B");
    await waitFor(() => b.store.has(n1));
    expect(b.store.read(n1)).toEqual(a.store.read(n1));
    expect(b.store.stateVector(n1)).toEqual({ A: 2 });
    expect(a.manager.session("B")?.stats.snapshotsSent).toBe(1);
    expect(b.manager.session("A")?.stats.snapshotsReceived).toBe(1);
  } finally {
    a.stop();
    b.stop();
  }
});

test("the codec refuses frames from another protocol version", () => {
  const codec = createCborSyncCodec();
  expect(() => codec.decode(encodeCanonical({ v: 2, payload: { case: "heartbeat", value: { ts: 1 } } }))).toThrow(
    "malformed sync message: unsupported protocol version 2",
  );
  const msg: SyncMessage = { v: 1, payload: { case: "ack", value: { ref: n2, upTo: { A: 3 } } } };
  expect(codec.decode(codec.encode(msg))).toEqual(msg);
});
