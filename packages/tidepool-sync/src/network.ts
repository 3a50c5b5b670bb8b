import type { Dialer, PeerDiscovery } from "./discovery.js";
import { NetworkTransientError } from "./errors.js";
import type { DuplexTransport, Unsubscribe } from "./transport.js";
import { createInMemoryDuplex } from "./transport.js";

export type Acceptor = (peerId: string, transport: DuplexTransport<Uint8Array>) => void;

type Link = {
  a: string;
  b: string;
  close: () => void;
};

export interface InMemoryNetwork {
  /** Registers a node; incoming dials are handed to `acceptor`. Unregistering drops the node's links. */
  listen(nodeId: string, acceptor: Acceptor): Unsubscribe;
  dialer(nodeId: string): Dialer;
  discovery(nodeId: string): PeerDiscovery;
  /**
   * Splits the network. Frames between groups are silently dropped and new
   * dials across groups fail; nodes in no group reach nobody.
   */
  partition(groups: string[][]): void;
  heal(): void;
  reachable(a: string, b: string): boolean;
  /** Number of open links, for tests. */
  readonly linkCount: number;
}

/** In-process hub standing in for a real network in tests. */
export function createInMemoryNetwork(): InMemoryNetwork {
  const acceptors = new Map<string, Acceptor>();
  const links = new Set<Link>();
  let groupOf: Map<string, number> | null = null;

  const reachable = (a: string, b: string): boolean => {
    if (!groupOf) return true;
    const ga = groupOf.get(a);
    return ga !== undefined && ga === groupOf.get(b);
  };

  const guard = (from: string, to: string, inner: DuplexTransport<Uint8Array>): DuplexTransport<Uint8Array> => ({
    send: async (msg) => {
      if (!reachable(from, to)) return;
      await inner.send(msg);
    },
    onMessage: (handler) => inner.onMessage(handler),
    onClose: (handler) => (inner.onClose ? inner.onClose(handler) : () => {}),
    close: () => inner.close?.(),
  });

  const dial = async (from: string, to: string): Promise<DuplexTransport<Uint8Array>> => {
    const acceptor = acceptors.get(to);
    if (!acceptor) throw new NetworkTransientError(`${to} is not listening`);
    if (!reachable(from, to)) throw new NetworkTransientError(`${to} is unreachable from ${from}`);

    const [local, remote] = createInMemoryDuplex<Uint8Array>();
    const link: Link = { a: from, b: to, close: () => local.close?.() };
    links.add(link);
    local.onClose?.(() => links.delete(link));
    acceptor(from, guard(to, from, remote));
    return guard(from, to, local);
  };

  return {
    listen(nodeId, acceptor) {
      if (acceptors.has(nodeId)) throw new Error(`${nodeId} is already listening`);
      acceptors.set(nodeId, acceptor);
      return () => {
        acceptors.delete(nodeId);
        for (const link of Array.from(links)) {
          if (link.a === nodeId || link.b === nodeId) link.close();
        }
      };
    },
    dialer: (nodeId) => (peerId) => dial(nodeId, peerId),
    discovery: (nodeId) => ({
      peers: async () => Array.from(acceptors.keys()).filter((id) => id !== nodeId),
    }),
    partition(groups) {
      const next = new Map<string, number>();
      groups.forEach((group, i) => {
        for (const id of group) {
          if (next.has(id)) throw new Error(`${id} is in more than one partition group`);
          next.set(id, i);
        }
      });
      groupOf = next;
    },
    heal() {
      groupOf = null;
    },
    reachable,
    get linkCount() {
      return links.size;
    },
  };
}
