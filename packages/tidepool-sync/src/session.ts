import { ImmutableConflictError } from "@tidepool/crdt";
import type { Delta, DocumentRef, DocumentStore, Logger } from "@tidepool/store";
import { componentLogger, docKey } from "@tidepool/store";

import type { BackoffOptions } from "./backoff.js";
import { Backoff } from "./backoff.js";
import { NetworkTransientError, ProtocolViolationError } from "./errors.js";
import type { OutboundQueueOptions } from "./queue.js";
import { OutboundQueue } from "./queue.js";
import type { PeerState } from "./state.js";
import { assertTransition, isConnected } from "./state.js";
import type { DuplexTransport, Unsubscribe, WireCodec } from "./transport.js";
import { wrapDuplexTransportWithCodec } from "./transport.js";
import type { DeltaBatch, Handshake, Snapshot, SyncError, SyncMessage, SyncMessagePayload } from "./types.js";
import { SYNC_PROTOCOL_VERSION } from "./types.js";
import { errorMessage, positiveNumber, sleepUntil } from "./util.js";

export type PeerSessionOptions = {
  queue?: OutboundQueueOptions;
  backoff?: BackoffOptions;
  /** Heartbeat interval. Default 5000. */
  heartbeatMs?: number;
  /** Silence after which the peer counts as partitioned. Default 15 000. */
  peerTimeoutMs?: number;
  /** Deltas per batch during catch-up. Default 256. */
  batchSize?: number;
};

export type PeerStats = {
  deltasSent: number;
  deltasReceived: number;
  bytesSent: number;
  bytesReceived: number;
  snapshotsSent: number;
  snapshotsReceived: number;
  reconnects: number;
  failedDials: number;
};

/** Why a session reached `closed`. */
export type CloseReason = "local" | "violation" | "rejected" | "lost" | "gave-up";

export type PeerSessionInit = {
  nodeId: string;
  peerId: string;
  store: DocumentStore;
  codec: WireCodec<SyncMessage, Uint8Array>;
  /** Present on the dialing side; a lost connection is then redialed. */
  dial?: () => Promise<DuplexTransport<Uint8Array>>;
  logger?: Logger;
  options?: PeerSessionOptions;
};

type Connection = {
  id: number;
  transport: DuplexTransport<SyncMessage>;
  unsubscribe: Unsubscribe[];
};

export type StateListener = (state: PeerState, previous: PeerState) => void;

/**
 * One peer: its connection state machine, outbound queue and counters. The
 * session outlives individual connections; each reconnect redoes the
 * state-vector handshake.
 */
export class PeerSession {
  readonly peerId: string;
  readonly stats: PeerStats = {
    deltasSent: 0,
    deltasReceived: 0,
    bytesSent: 0,
    bytesReceived: 0,
    snapshotsSent: 0,
    snapshotsReceived: 0,
    reconnects: 0,
    failedDials: 0,
  };
  lastError: Error | null = null;
  closeReason: CloseReason | null = null;

  private readonly nodeId: string;
  private readonly store: DocumentStore;
  private readonly codec: WireCodec<SyncMessage, Uint8Array>;
  private readonly dial: (() => Promise<DuplexTransport<Uint8Array>>) | undefined;
  private readonly log: Logger;
  private readonly queue: OutboundQueue;
  private readonly backoff: Backoff;
  private readonly heartbeatMs: number;
  private readonly peerTimeoutMs: number;
  private readonly batchSize: number;
  private readonly abort = new AbortController();
  private readonly listeners = new Set<StateListener>();

  private stateValue: PeerState = "discovering";
  private conn: Connection | null = null;
  private connSeq = 0;
  private reconnectRun = 0;
  private pumping = false;
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private lastInbound = 0;

  constructor(init: PeerSessionInit) {
    const opts = init.options ?? {};
    this.nodeId = init.nodeId;
    this.peerId = init.peerId;
    this.store = init.store;
    this.codec = init.codec;
    this.dial = init.dial;
    this.log = componentLogger(init.logger, "peer-session").child({ peer: init.peerId });
    this.queue = new OutboundQueue(opts.queue);
    this.backoff = new Backoff(opts.backoff);
    this.heartbeatMs = positiveNumber(opts.heartbeatMs ?? 5_000, "heartbeatMs");
    this.peerTimeoutMs = positiveNumber(opts.peerTimeoutMs ?? 15_000, "peerTimeoutMs");
    if (this.peerTimeoutMs <= this.heartbeatMs) throw new Error("peerTimeoutMs must exceed heartbeatMs");
    this.batchSize = positiveNumber(opts.batchSize ?? 256, "batchSize");
  }

  get state(): PeerState {
    return this.stateValue;
  }

  get dialing(): boolean {
    return this.dial !== undefined;
  }

  get queueDepth(): number {
    return this.queue.depth;
  }

  get deferredDepth(): number {
    return this.queue.deferredDepth;
  }

  get coalesced(): number {
    return this.queue.coalesced;
  }

  onStateChange(listener: StateListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Dials for the first time. Failures move the session into reconnection. */
  async start(): Promise<void> {
    const dial = this.dial;
    if (!dial) throw new Error("session has no dialer");
    if (this.stateValue !== "discovering") return;
    try {
      const wire = await dial();
      if (this.stateValue !== "discovering") {
        wire.close?.();
        return;
      }
      this.attach(wire);
    } catch (err) {
      if (this.stateValue !== "discovering") return;
      this.stats.failedDials += 1;
      this.log.warn({ err: errorMessage(err) }, "dial failed");
      this.lost(err instanceof NetworkTransientError ? err : new NetworkTransientError(errorMessage(err), { cause: err }));
    }
  }

  /** Takes a freshly opened transport and starts the handshake on it. */
  attach(wire: DuplexTransport<Uint8Array>): void {
    if (this.stateValue === "closed") {
      wire.close?.();
      return;
    }
    if (isConnected(this.stateValue)) {
      const previous = this.detach();
      previous?.transport.close?.();
      this.transition("disconnected");
    }
    if (this.stateValue === "disconnected" || this.stateValue === "partitioned") this.transition("reconnecting");

    const id = ++this.connSeq;
    const counted: WireCodec<SyncMessage, Uint8Array> = {
      encode: (msg) => {
        const bytes = this.codec.encode(msg);
        this.stats.bytesSent += bytes.length;
        return bytes;
      },
      decode: (bytes) => {
        this.stats.bytesReceived += bytes.length;
        return this.codec.decode(bytes);
      },
    };
    const transport = wrapDuplexTransportWithCodec(wire, counted, {
      onDecodeError: (err) => this.violation(id, err),
    });
    const unsubscribe = [transport.onMessage((msg) => this.receive(id, msg))];
    if (transport.onClose) {
      unsubscribe.push(transport.onClose((reason) => this.connectionLost(id, "disconnected", reason)));
    }
    const conn: Connection = { id, transport, unsubscribe };
    this.conn = conn;
    this.lastInbound = Date.now();
    this.transition("handshaking");
    this.heartbeat = setInterval(() => this.checkHeartbeat(id), this.heartbeatMs);

    const hello: Handshake = { nodeId: this.nodeId, stateVector: this.store.stateVectors() };
    void this.send(conn, { case: "handshake", value: hello });
  }

  /** Queues a committed delta for this peer. */
  enqueue(delta: Delta): void {
    if (this.stateValue === "closed") return;
    this.queue.push(delta);
    if (this.stateValue === "steady") void this.pump();
  }

  close(): void {
    this.shutdown("local");
  }

  private transition(to: PeerState): void {
    const from = this.stateValue;
    assertTransition(from, to);
    this.stateValue = to;
    this.log.info({ from, to }, "peer state");
    for (const listener of Array.from(this.listeners)) listener(to, from);
  }

  private detach(): Connection | null {
    const conn = this.conn;
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    if (!conn) return null;
    for (const unsubscribe of conn.unsubscribe) unsubscribe();
    this.conn = null;
    return conn;
  }

  private shutdown(reason: CloseReason): void {
    if (this.stateValue === "closed") return;
    const conn = this.detach();
    conn?.transport.close?.();
    this.closeReason = reason;
    this.abort.abort();
    this.queue.clear();
    this.transition("closed");
  }

  private async send(conn: Connection, payload: SyncMessagePayload): Promise<boolean> {
    try {
      await conn.transport.send({ v: SYNC_PROTOCOL_VERSION, payload });
      return true;
    } catch (err) {
      if (err instanceof NetworkTransientError) {
        this.log.warn({ err: err.message }, "send failed");
      } else {
        this.log.error({ err: errorMessage(err) }, "send failed");
      }
      this.connectionLost(conn.id, "disconnected", errorMessage(err));
      return false;
    }
  }

  private async sendBatch(conn: Connection, ref: DocumentRef, deltas: Delta[]): Promise<boolean> {
    const ok = await this.send(conn, { case: "deltaBatch", value: { ref, deltas } });
    if (ok) this.stats.deltasSent += deltas.length;
    return ok;
  }

  private receive(connId: number, msg: SyncMessage): void {
    const conn = this.conn;
    if (!conn || conn.id !== connId) return;
    this.lastInbound = Date.now();
    const { payload } = msg;
    switch (payload.case) {
      case "handshake":
        void this.onHandshake(conn, payload.value);
        return;
      case "deltaBatch":
        this.onDeltaBatch(conn, payload.value);
        return;
      case "ack":
        this.queue.prune(docKey(payload.value.ref), payload.value.upTo);
        return;
      case "snapshot":
        this.onSnapshot(conn, payload.value);
        return;
      case "heartbeat":
        return;
      case "error":
        this.onPeerError(conn, payload.value);
        return;
      default: {
        const _exhaustive: never = payload;
        return _exhaustive;
      }
    }
  }

  private async onHandshake(conn: Connection, hello: Handshake): Promise<void> {
    if (hello.nodeId !== this.peerId) {
      this.violation(conn.id, new ProtocolViolationError(`handshake from ${hello.nodeId}, expected ${this.peerId}`));
      return;
    }
    if (this.stateValue !== "handshaking") return;
    this.transition("syncing");
    for (const [key, vector] of Object.entries(hello.stateVector)) this.queue.prune(key, vector);

    for (const ref of this.store.refs()) {
      if (this.conn !== conn) return;
      const remote = hello.stateVector[docKey(ref)] ?? {};
      if (this.store.needsSnapshot(ref, remote)) {
        const ok = await this.send(conn, { case: "snapshot", value: { ref, bytes: this.store.exportSnapshot(ref) } });
        if (!ok) return;
        this.stats.snapshotsSent += 1;
        continue;
      }
      const missing = this.store.missingDeltas(ref, remote);
      for (let i = 0; i < missing.length; i += this.batchSize) {
        if (!(await this.sendBatch(conn, ref, missing.slice(i, i + this.batchSize)))) return;
      }
    }

    if (this.conn !== conn || this.state !== "syncing") return;
    this.transition("steady");
    this.backoff.reset();
    void this.pump();
  }

  private async pump(): Promise<void> {
    if (this.pumping) return;
    this.pumping = true;
    try {
      for (;;) {
        const conn = this.conn;
        if (!conn || this.stateValue !== "steady") return;
        const item = this.queue.shift();
        if (!item) return;
        const deltas = [...item.covers].sort((a, b) => a.seq - b.seq);
        deltas.push(item.delta);
        if (!(await this.sendBatch(conn, item.ref, deltas))) return;
      }
    } finally {
      this.pumping = false;
    }
  }

  /** A batch is checked as a whole before any of it is applied. */
  private onDeltaBatch(conn: Connection, batch: DeltaBatch): void {
    const { ref, deltas } = batch;
    try {
      for (const delta of deltas) this.store.checkRemote(ref, delta);
    } catch (err) {
      this.violation(conn.id, new ProtocolViolationError(`rejected delta batch for ${docKey(ref)}: ${errorMessage(err)}`, { cause: err }));
      return;
    }

    for (const delta of deltas) {
      try {
        this.store.applyRemote(ref, delta, this.peerId);
      } catch (err) {
        if (err instanceof ImmutableConflictError) {
          this.log.error({ doc: docKey(ref), actor: delta.actor, seq: delta.seq, err: err.message }, "conflicting immutable write");
          continue;
        }
        this.violation(conn.id, err);
        return;
      }
    }
    this.stats.deltasReceived += deltas.length;
    this.log.debug({ doc: docKey(ref), deltas: deltas.length }, "delta batch applied");
    void this.send(conn, { case: "ack", value: { ref, upTo: this.store.stateVector(ref) } });
  }

  private onSnapshot(conn: Connection, snapshot: Snapshot): void {
    if (!this.store.schemas.get(snapshot.ref.namespace)) {
      this.log.warn({ doc: docKey(snapshot.ref) }, "ignoring snapshot for unknown namespace");
      return;
    }
    try {
      this.store.importSnapshot(snapshot.bytes, this.peerId);
    } catch (err) {
      this.violation(conn.id, err);
      return;
    }
    this.stats.snapshotsReceived += 1;
    void this.send(conn, { case: "ack", value: { ref: snapshot.ref, upTo: this.store.stateVector(snapshot.ref) } });
  }

  private onPeerError(conn: Connection, err: SyncError): void {
    this.lastError = new Error(`peer reported ${err.code}: ${err.message}`);
    this.log.warn({ code: err.code, err: err.message }, "peer reported an error");
    if (err.code === "PROTOCOL_VIOLATION") {
      this.shutdown("rejected");
      return;
    }
    this.connectionLost(conn.id, "disconnected", err.message);
  }

  private violation(connId: number, err: unknown): void {
    const conn = this.conn;
    if (!conn || conn.id !== connId) return;
    const error =
      err instanceof ProtocolViolationError ? err : new ProtocolViolationError(errorMessage(err), { cause: err });
    this.lastError = error;
    this.log.error({ err: error.message }, "protocol violation; dropping peer");

    this.detach();
    this.closeReason = "violation";
    this.abort.abort();
    this.queue.clear();
    this.transition("closed");
    void this.sendAndClose(conn, { case: "error", value: { code: "PROTOCOL_VIOLATION", message: error.message } });
  }

  private async sendAndClose(conn: Connection, payload: SyncMessagePayload): Promise<void> {
    try {
      await conn.transport.send({ v: SYNC_PROTOCOL_VERSION, payload });
    } catch (err) {
      this.log.debug({ err: errorMessage(err) }, "could not deliver error to peer");
    } finally {
      conn.transport.close?.();
    }
  }

  private checkHeartbeat(connId: number): void {
    const conn = this.conn;
    if (!conn || conn.id !== connId) return;
    if (Date.now() - this.lastInbound > this.peerTimeoutMs) {
      this.connectionLost(connId, "partitioned", "peer timed out");
      return;
    }
    void this.send(conn, { case: "heartbeat", value: { ts: Date.now() } });
  }

  private connectionLost(connId: number, to: "disconnected" | "partitioned", reason: string): void {
    const conn = this.conn;
    if (!conn || conn.id !== connId) return;
    this.detach();
    conn.transport.close?.();
    this.log.warn({ reason, state: to }, "connection lost");
    this.transition(to);
    this.lost(new NetworkTransientError(reason));
  }

  /** From `disconnected`/`partitioned` (or a failed first dial): redial, or close when not the dialing side. */
  private lost(err: NetworkTransientError): void {
    if (this.stateValue === "discovering") this.transition("disconnected");
    this.lastError = err;
    if (!this.dial) {
      this.closeReason = "lost";
      this.abort.abort();
      this.queue.clear();
      this.transition("closed");
      return;
    }
    this.transition("reconnecting");
    void this.reconnect(this.dial);
  }

  private async reconnect(dial: () => Promise<DuplexTransport<Uint8Array>>): Promise<void> {
    const run = ++this.reconnectRun;
    const current = () => run === this.reconnectRun && this.stateValue === "reconnecting";
    while (current()) {
      const delay = this.backoff.next();
      if (delay === null) {
        this.log.warn({ attempts: this.backoff.attempts }, "giving up on peer");
        this.shutdown("gave-up");
        return;
      }
      const slept = await sleepUntil(delay, this.abort.signal);
      if (!slept || !current()) return;
      this.stats.reconnects += 1;
      try {
        const wire = await dial();
        if (!current()) {
          wire.close?.();
          return;
        }
        this.attach(wire);
        return;
      } catch (err) {
        if (!current()) return;
        this.stats.failedDials += 1;
        if (!(err instanceof NetworkTransientError)) {
          this.lastError = err instanceof Error ? err : new Error(String(err));
          this.log.error({ err: errorMessage(err) }, "dial failed permanently");
          this.shutdown("gave-up");
          return;
        }
        this.log.warn({ err: err.message, attempt: this.backoff.attempts }, "redial failed");
      }
    }
  }
}
