import type { DocumentStore, Logger } from "@tidepool/store";
import { componentLogger } from "@tidepool/store";

import { createCborSyncCodec } from "./codec.js";
import type { Dialer, PeerDiscovery } from "./discovery.js";
import type { PeerSessionOptions, PeerStats } from "./session.js";
import { PeerSession } from "./session.js";
import type { PeerState } from "./state.js";
import { isConnected } from "./state.js";
import type { DuplexTransport, Unsubscribe, WireCodec } from "./transport.js";
import type { SyncMessage } from "./types.js";
import { errorMessage } from "./util.js";

export type PeerManagerOptions = {
  store: DocumentStore;
  /** Defaults to the store's actor id. */
  nodeId?: string;
  dialer?: Dialer;
  discovery?: PeerDiscovery;
  codec?: WireCodec<SyncMessage, Uint8Array>;
  logger?: Logger;
  session?: PeerSessionOptions;
};

export type PeerInfo = {
  peerId: string;
  state: PeerState;
  dialing: boolean;
  queueDepth: number;
  deferredDepth: number;
  stats: PeerStats;
  lastError: string | null;
};

/**
 * Owns one session per peer and feeds every committed delta to each of them,
 * except back to the peer it came from.
 */
export class PeerManager {
  readonly nodeId: string;
  private readonly store: DocumentStore;
  private readonly dialer: Dialer | undefined;
  private readonly discovery: PeerDiscovery | undefined;
  private readonly codec: WireCodec<SyncMessage, Uint8Array>;
  private readonly logger: Logger | undefined;
  private readonly log: Logger;
  private readonly sessionOptions: PeerSessionOptions | undefined;
  private readonly sessions = new Map<string, PeerSession>();
  private readonly unsubscribe: Unsubscribe;
  private closed = false;

  constructor(opts: PeerManagerOptions) {
    this.store = opts.store;
    this.nodeId = opts.nodeId ?? opts.store.context.actor;
    this.dialer = opts.dialer;
    this.discovery = opts.discovery;
    this.codec = opts.codec ?? createCborSyncCodec();
    this.logger = opts.logger;
    this.log = componentLogger(opts.logger, "peer-manager").child({ node: this.nodeId });
    this.sessionOptions = opts.session;
    this.unsubscribe = this.store.onDelta((delta, origin) => {
      for (const session of this.sessions.values()) {
        if (session.peerId !== origin) session.enqueue(delta);
      }
    });
  }

  /** Dials every discovered peer not already known. */
  async start(): Promise<void> {
    if (!this.discovery) return;
    let found: string[];
    try {
      found = await this.discovery.peers();
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "discovery failed");
      return;
    }
    for (const peerId of found) {
      if (peerId !== this.nodeId && !this.sessions.has(peerId)) this.connect(peerId);
    }
  }

  /** Starts a dialing session; it keeps redialing with backoff until closed. */
  connect(peerId: string): PeerSession {
    this.assertOpen();
    const dialer = this.dialer;
    if (!dialer) throw new Error("PeerManager has no dialer");
    if (peerId === this.nodeId) throw new Error("cannot connect to self");
    const existing = this.sessions.get(peerId);
    if (existing && existing.state !== "closed") return existing;

    const session = this.track(new PeerSession({ ...this.sessionInit(peerId), dial: () => dialer(peerId) }));
    void session.start();
    return session;
  }

  /**
   * Takes an inbound connection. With a live session already in place, the
   * connection dialed by the lower node id wins, so both ends keep the same one.
   */
  accept(peerId: string, wire: DuplexTransport<Uint8Array>): PeerSession | null {
    if (this.closed || peerId === this.nodeId) {
      wire.close?.();
      return null;
    }
    const existing = this.sessions.get(peerId);
    if (existing?.closeReason === "violation") {
      this.log.warn({ peer: peerId }, "refusing peer dropped for a protocol violation");
      wire.close?.();
      return null;
    }
    if (existing && existing.state !== "closed") {
      if (isConnected(existing.state) && existing.dialing && this.nodeId < peerId) {
        wire.close?.();
        return existing;
      }
      existing.attach(wire);
      return existing;
    }

    const session = this.track(new PeerSession(this.sessionInit(peerId)));
    session.attach(wire);
    return session;
  }

  disconnect(peerId: string): void {
    const session = this.sessions.get(peerId);
    if (!session) return;
    session.close();
    this.sessions.delete(peerId);
  }

  session(peerId: string): PeerSession | undefined {
    return this.sessions.get(peerId);
  }

  peers(): PeerInfo[] {
    return Array.from(this.sessions.values(), (s) => ({
      peerId: s.peerId,
      state: s.state,
      dialing: s.dialing,
      queueDepth: s.queueDepth,
      deferredDepth: s.deferredDepth,
      stats: { ...s.stats },
      lastError: s.lastError?.message ?? null,
    })).sort((a, b) => (a.peerId < b.peerId ? -1 : a.peerId > b.peerId ? 1 : 0));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.unsubscribe();
    for (const session of this.sessions.values()) session.close();
    this.sessions.clear();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error("PeerManager is closed");
  }

  private sessionInit(peerId: string) {
    return {
      nodeId: this.nodeId,
      peerId,
      store: this.store,
      codec: this.codec,
      logger: this.logger,
      options: this.sessionOptions,
    };
  }

  private track(session: PeerSession): PeerSession {
    this.sessions.set(session.peerId, session);
    session.onStateChange((state) => {
      if (state !== "closed" || session.closeReason === "violation") return;
      if (this.sessions.get(session.peerId) === session) this.sessions.delete(session.peerId);
    });
    return session;
  }
}
