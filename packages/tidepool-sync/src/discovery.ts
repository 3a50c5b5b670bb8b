import type { DuplexTransport } from "./transport.js";

/** Opens a byte transport to a peer. Rejects with `NetworkTransientError` when it cannot. */
export type Dialer = (peerId: string) => Promise<DuplexTransport<Uint8Array>>;

export interface PeerDiscovery {
  /** Peers currently known to exist, possibly including the local node. */
  peers(): Promise<string[]>;
}

export function createStaticDiscovery(peerIds: Iterable<string>): PeerDiscovery {
  const list = Array.from(new Set(peerIds));
  return {
    peers: async () => [...list],
  };
}
