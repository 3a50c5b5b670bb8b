import type { LogLevel } from "@tidepool/store";
import { isLogLevel } from "@tidepool/store";

export type ServerConfig = {
  host: string;
  port: number;
  /** sqlite file, or `:memory:`. */
  dbPath: string;
  /** Local actor id; random when unset. */
  actor: string | undefined;
  logLevel: LogLevel;
  maxPayloadBytes: number;
  /** Peer id to base URL, from `TIDEPOOL_PEERS=id=ws://host:port,...`. */
  peers: Record<string, string>;
};

function parsePeers(raw: string): Record<string, string> {
  const peers: Record<string, string> = {};
  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (trimmed.length === 0) continue;
    const eq = trimmed.indexOf("=");
    const id = trimmed.slice(0, eq).trim();
    const url = trimmed.slice(eq + 1).trim();
    if (eq <= 0 || !/^wss?:\/\//.test(url)) throw new Error(`invalid TIDEPOOL_PEERS entry: ${trimmed}`);
    peers[id] = url;
  }
  return peers;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const host = env.HOST ?? "0.0.0.0";
  const port = Number(env.PORT ?? "8787");
  const maxPayloadBytes = Number(env.TIDEPOOL_MAX_PAYLOAD_BYTES ?? String(10 * 1024 * 1024));
  const logLevel = env.TIDEPOOL_LOG_LEVEL ?? "info";

  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`invalid PORT: ${env.PORT}`);
  if (!Number.isFinite(maxPayloadBytes) || maxPayloadBytes <= 0) {
    throw new Error(`invalid TIDEPOOL_MAX_PAYLOAD_BYTES: ${env.TIDEPOOL_MAX_PAYLOAD_BYTES}`);
  }
  if (!isLogLevel(logLevel)) throw new Error(`invalid TIDEPOOL_LOG_LEVEL: ${logLevel}`);

  return {
    host,
    port,
    dbPath: env.TIDEPOOL_DB_PATH ?? "./data/tidepool.sqlite3",
    actor: env.TIDEPOOL_ACTOR || undefined,
    logLevel,
    maxPayloadBytes,
    peers: parsePeers(env.TIDEPOOL_PEERS ?? ""),
  };
}
