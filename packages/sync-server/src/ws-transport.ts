import WebSocket from "ws";

import type { DuplexTransport } from "@tidepool/sync";
import { NetworkTransientError } from "@tidepool/sync";

function toUint8Array(data: WebSocket.RawData): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return Buffer.concat(data);
}

/**
 * Byte transport over an open socket. Frames that arrive before the first
 * handler subscribes are held and delivered to it in order.
 */
export function createWebSocketTransport(ws: WebSocket): DuplexTransport<Uint8Array> {
  const handlers = new Set<(bytes: Uint8Array) => void>();
  const closeHandlers = new Set<(reason: string) => void>();
  let pending: Uint8Array[] = [];
  let closedReason: string | null = null;
  let lastError: string | null = null;

  ws.on("message", (data: WebSocket.RawData) => {
    const bytes = toUint8Array(data);
    if (handlers.size === 0) {
      pending.push(bytes);
      return;
    }
    for (const handler of handlers) handler(bytes);
  });
  ws.on("error", (err: Error) => {
    lastError = err.message;
  });
  ws.once("close", (code: number, reason: Buffer) => {
    closedReason = reason.length > 0 ? reason.toString("utf8") : (lastError ?? `socket closed (${code})`);
    const reasonText = closedReason;
    for (const handler of closeHandlers) handler(reasonText);
    closeHandlers.clear();
  });

  return {
    send: (bytes) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new NetworkTransientError("websocket is not open"));
          return;
        }
        ws.send(bytes, { binary: true }, (err) =>
          err ? reject(new NetworkTransientError(`websocket send failed: ${err.message}`, { cause: err })) : resolve(),
        );
      }),
    onMessage: (handler) => {
      handlers.add(handler);
      if (pending.length > 0) {
        const held = pending;
        pending = [];
        for (const bytes of held) handler(bytes);
      }
      return () => {
        handlers.delete(handler);
      };
    },
    onClose: (handler) => {
      if (closedReason !== null) {
        const reason = closedReason;
        queueMicrotask(() => handler(reason));
        return () => {};
      }
      closeHandlers.add(handler);
      return () => {
        closeHandlers.delete(handler);
      };
    },
    close: () => {
      if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) return;
      ws.close(1000, "closed");
    },
  };
}
