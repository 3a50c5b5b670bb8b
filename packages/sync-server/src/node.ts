import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import { ACCOUNT_SCHEMA, TRANSACTION_SCHEMA } from "@tidepool/ledger";
import type { Logger, SchemaInput } from "@tidepool/store";
import { DocumentStore, createSqlitePersistence } from "@tidepool/store";
import type { PeerSessionOptions } from "@tidepool/sync";
import { PeerManager, createStaticDiscovery } from "@tidepool/sync";

import type { ServerConfig } from "./config.js";
import { createWebSocketDialer } from "./dialer.js";
import type { WebSocketSyncServerHandle } from "./server.js";
import { startWebSocketSyncServer } from "./server.js";

export type SyncNodeOptions = {
  logger?: Logger;
  /** Application schemas; the ledger namespaces are always registered. */
  schemas?: SchemaInput[];
  session?: PeerSessionOptions;
};

export type SyncNode = {
  store: DocumentStore;
  manager: PeerManager;
  server: WebSocketSyncServerHandle;
  close: () => Promise<void>;
};

/** Opens the sqlite-backed store, serves it over WebSocket and dials the configured peers. */
export async function startSyncNode(config: ServerConfig, opts: SyncNodeOptions = {}): Promise<SyncNode> {
  if (config.dbPath !== ":memory:") fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
  const db = new Database(config.dbPath);
  db.pragma("journal_mode = WAL");

  const store = DocumentStore.open({
    actor: config.actor,
    logger: opts.logger,
    persistence: createSqlitePersistence(db, { ownsDb: true }),
    schemas: [ACCOUNT_SCHEMA, TRANSACTION_SCHEMA, ...(opts.schemas ?? [])],
  });
  const nodeId = store.context.actor;
  const manager = new PeerManager({
    store,
    nodeId,
    dialer: createWebSocketDialer({ nodeId, peers: config.peers, maxPayloadBytes: config.maxPayloadBytes }),
    discovery: createStaticDiscovery(Object.keys(config.peers)),
    logger: opts.logger,
    session: opts.session,
  });

  let server: WebSocketSyncServerHandle;
  try {
    server = await startWebSocketSyncServer({
      manager,
      host: config.host,
      port: config.port,
      maxPayloadBytes: config.maxPayloadBytes,
      logger: opts.logger,
    });
  } catch (err) {
    manager.close();
    store.close();
    throw err;
  }
  await manager.start();

  return {
    store,
    manager,
    server,
    close: async () => {
      manager.close();
      await server.close();
      store.close();
    },
  };
}
