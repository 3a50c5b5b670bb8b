import http from "node:http";

import { WebSocketServer } from "ws";

import type { Logger } from "@tidepool/store";
import { componentLogger } from "@tidepool/store";
import type { PeerManager } from "@tidepool/sync";

import { createWebSocketTransport } from "./ws-transport.js";

export type WebSocketSyncServerOptions = {
  manager: PeerManager;
  host?: string;
  port?: number;
  syncPath?: string;
  healthPath?: string;
  maxPayloadBytes?: number;
  logger?: Logger;
};

export type WebSocketSyncServerHandle = {
  host: string;
  port: number;
  close: () => Promise<void>;
};

const PEER_ID = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Serves `ws://host:port/sync?peer=<id>`: each upgrade becomes an inbound
 * session on `manager` for the named peer.
 */
export async function startWebSocketSyncServer(opts: WebSocketSyncServerOptions): Promise<WebSocketSyncServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 8787);
  const syncPath = opts.syncPath ?? "/sync";
  const healthPath = opts.healthPath ?? "/health";
  const maxPayloadBytes = Number(opts.maxPayloadBytes ?? 10 * 1024 * 1024);
  const log = componentLogger(opts.logger, "sync-server");

  if (!Number.isFinite(port) || port < 0) throw new Error(`invalid port: ${opts.port}`);
  if (!syncPath.startsWith("/")) throw new Error(`syncPath must start with "/": ${syncPath}`);
  if (!healthPath.startsWith("/")) throw new Error(`healthPath must start with "/": ${healthPath}`);
  if (!Number.isFinite(maxPayloadBytes) || maxPayloadBytes <= 0) {
    throw new Error(`invalid maxPayloadBytes: ${opts.maxPayloadBytes}`);
  }

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname === healthPath) {
      res.writeHead(200, { "content-type": "text/plain" });
      res.end("ok");
      return;
    }

    res.writeHead(404, { "content-type": "text/plain" });
    res.end("not found");
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: maxPayloadBytes });

  server.on("upgrade", (req, socket, head) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname !== syncPath) {
      socket.destroy();
      return;
    }
    const peerId = url.searchParams.get("peer");
    if (!peerId || !PEER_ID.test(peerId)) {
      log.warn({ peer: peerId }, "rejecting upgrade without a valid peer id");
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      const session = opts.manager.accept(peerId, createWebSocketTransport(ws));
      if (!session) {
        log.info({ peer: peerId }, "connection refused by peer manager");
        return;
      }
      log.info({ peer: peerId }, "peer connected");
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, resolve);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;
  log.info({ host, port: actualPort, syncPath }, "listening");

  const close = async (): Promise<void> => {
    const closing = Array.from(wss.clients, (ws) =>
      new Promise<void>((resolve) => {
        const timer = setTimeout(() => ws.terminate(), 1000);
        ws.once("close", () => {
          clearTimeout(timer);
          resolve();
        });
        ws.close(1001, "server shutting down");
      }),
    );
    await Promise.all(closing);
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { host, port: actualPort, close };
}
