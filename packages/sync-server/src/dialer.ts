import WebSocket from "ws";

import type { Dialer } from "@tidepool/sync";
import { NetworkTransientError } from "@tidepool/sync";

import { createWebSocketTransport } from "./ws-transport.js";

export type WebSocketDialerOptions = {
  /** Sent as `?peer=` so the remote end knows who is dialing. */
  nodeId: string;
  /** Peer id to `ws://` / `wss://` base URL. */
  peers: Record<string, string>;
  syncPath?: string;
  connectTimeoutMs?: number;
  maxPayloadBytes?: number;
};

export function syncUrl(base: string, nodeId: string, syncPath = "/sync"): string {
  const url = new URL(base);
  if (url.protocol !== "ws:" && url.protocol !== "wss:") throw new Error(`not a websocket url: ${base}`);
  if (url.pathname === "/" || url.pathname === "") url.pathname = syncPath;
  url.searchParams.set("peer", nodeId);
  return url.toString();
}

export function createWebSocketDialer(opts: WebSocketDialerOptions): Dialer {
  const connectTimeoutMs = opts.connectTimeoutMs ?? 5000;
  const maxPayloadBytes = opts.maxPayloadBytes ?? 10 * 1024 * 1024;
  if (!Number.isFinite(connectTimeoutMs) || connectTimeoutMs <= 0) {
    throw new Error(`invalid connectTimeoutMs: ${opts.connectTimeoutMs}`);
  }
  const urls = new Map<string, string>();
  for (const [peerId, base] of Object.entries(opts.peers)) urls.set(peerId, syncUrl(base, opts.nodeId, opts.syncPath));

  return (peerId) => {
    const url = urls.get(peerId);
    if (!url) return Promise.reject(new Error(`no address configured for peer ${peerId}`));

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, { maxPayload: maxPayloadBytes });
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        ws.terminate();
        reject(new NetworkTransientError(`dial ${peerId} timed out after ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);
      const onError = (err: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(new NetworkTransientError(`dial ${peerId} failed: ${err.message}`, { cause: err }));
      };
      ws.on("error", onError);
      ws.once("open", () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        ws.off("error", onError);
        resolve(createWebSocketTransport(ws));
      });
    });
  };
}
