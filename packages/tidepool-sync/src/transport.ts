import { NetworkTransientError } from "./errors.js";

export type Unsubscribe = () => void;

export interface DuplexTransport<M> {
  send(msg: M): Promise<void>;
  onMessage(handler: (msg: M) => void): Unsubscribe;
  /** Fires once when the connection goes away, from either end. */
  onClose?(handler: (reason: string) => void): Unsubscribe;
  close?(): void;
}

export type WireCodec<Message, Wire> = {
  encode(message: Message): Wire;
  decode(wire: Wire): Message;
};

export type WrapCodecOptions = {
  /** Called instead of the message handler when a frame fails to decode. Rethrows when omitted. */
  onDecodeError?: (err: unknown) => void;
};

export function wrapDuplexTransportWithCodec<Wire, Message>(
  transport: DuplexTransport<Wire>,
  codec: WireCodec<Message, Wire>,
  opts: WrapCodecOptions = {},
): DuplexTransport<Message> {
  const wrapped: DuplexTransport<Message> = {
    send: async (msg) => transport.send(codec.encode(msg)),
    onMessage: (handler) =>
      transport.onMessage((wire) => {
        let msg: Message;
        try {
          msg = codec.decode(wire);
        } catch (err) {
          if (!opts.onDecodeError) throw err;
          opts.onDecodeError(err);
          return;
        }
        handler(msg);
      }),
  };
  if (transport.onClose) wrapped.onClose = transport.onClose.bind(transport);
  if (transport.close) wrapped.close = transport.close.bind(transport);
  return wrapped;
}

type Inbox<M> = {
  handlers: Set<(msg: M) => void>;
  pending: M[];
};

/**
 * Two connected ends. Delivery is asynchronous (microtask) and in order.
 * Frames that arrive before an end has a handler wait for it. Closing either
 * end closes both; frames sent before the close are still delivered.
 */
export function createInMemoryDuplex<M>(): [DuplexTransport<M>, DuplexTransport<M>] {
  const closeHandlers = new Set<(reason: string) => void>();
  let closed = false;

  const flush = (inbox: Inbox<M>) => {
    while (inbox.pending.length > 0 && inbox.handlers.size > 0) {
      const msg = inbox.pending.shift();
      if (msg === undefined) break;
      for (const h of Array.from(inbox.handlers)) h(msg);
    }
  };

  const deliver = (inbox: Inbox<M>, msg: M) => {
    inbox.pending.push(msg);
    flush(inbox);
  };

  const close = (reason: string) => {
    if (closed) return;
    closed = true;
    queueMicrotask(() => {
      for (const h of Array.from(closeHandlers)) h(reason);
      closeHandlers.clear();
    });
  };

  const end = (inbox: Inbox<M>, outbox: Inbox<M>): DuplexTransport<M> => ({
    async send(msg) {
      if (closed) throw new NetworkTransientError("transport closed");
      queueMicrotask(() => deliver(outbox, msg));
    },
    onMessage(handler) {
      inbox.handlers.add(handler);
      if (inbox.pending.length > 0) queueMicrotask(() => flush(inbox));
      return () => {
        inbox.handlers.delete(handler);
      };
    },
    onClose(handler) {
      if (closed) {
        queueMicrotask(() => handler("closed"));
        return () => {};
      }
      closeHandlers.add(handler);
      return () => {
        closeHandlers.delete(handler);
      };
    },
    close() {
      close("closed");
    },
  });

  const a: Inbox<M> = { handlers: new Set(), pending: [] };
  const b: Inbox<M> = { handlers: new Set(), pending: [] };
  return [end(a, b), end(b, a)];
}
