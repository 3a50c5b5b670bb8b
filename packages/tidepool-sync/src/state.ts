export const PEER_STATES = [
  "discovering",
  "handshaking",
  "syncing",
  "steady",
  "disconnected",
  "partitioned",
  "reconnecting",
  "closed",
] as const;

export type PeerState = (typeof PEER_STATES)[number];

/** Legal moves of a peer connection. `closed` is terminal. */
export const PEER_TRANSITIONS: Readonly<Record<PeerState, readonly PeerState[]>> = {
  discovering: ["handshaking", "disconnected", "closed"],
  handshaking: ["syncing", "disconnected", "partitioned", "closed"],
  syncing: ["steady", "disconnected", "partitioned", "closed"],
  steady: ["disconnected", "partitioned", "closed"],
  disconnected: ["reconnecting", "closed"],
  partitioned: ["reconnecting", "closed"],
  reconnecting: ["handshaking", "disconnected", "closed"],
  closed: [],
};

export function canTransition(from: PeerState, to: PeerState): boolean {
  return PEER_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PeerState, to: PeerState): void {
  if (!canTransition(from, to)) throw new Error(`illegal peer state transition ${from} -> ${to}`);
}

/** States in which a transport is attached. */
export function isConnected(state: PeerState): boolean {
  return state === "handshaking" || state === "syncing" || state === "steady";
}
