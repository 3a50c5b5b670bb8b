import { expect, test } from "vitest";

import { loadServerConfig } from "../src/index.js";

test("defaults apply when the environment is empty", () => {
  expect(loadServerConfig({})).toEqual({
    host: "0.0.0.0",
    port: 8787,
    dbPath: "./data/tidepool.sqlite3",
    actor: undefined,
    logLevel: "info",
    maxPayloadBytes: 10 * 1024 * 1024,
    peers: {},
  });
});

test("reads every variable", () => {
  const config = loadServerConfig({
    HOST: "127.0.0.1",
    PORT: "9000",
    TIDEPOOL_DB_PATH: "/tmp/node.sqlite3",
    TIDEPOOL_ACTOR: "node-a",
    TIDEPOOL_LOG_LEVEL: "debug",
    TIDEPOOL_MAX_PAYLOAD_BYTES: "4096",
    TIDEPOOL_PEERS: " node-b=ws://10.0.0.2:8787 , node-c=wss://c.example.test/sync,",
  });
  expect(config).toEqual({
    host: "127.0.0.1",
    port: 9000,
    dbPath: "/tmp/node.sqlite3",
    actor: "node-a",
    logLevel: "debug",
    maxPayloadBytes: 4096,
    peers: { "node-b": "ws://10.0.0.2:8787", "node-c": "wss://c.example.test/sync" },
  });
});

test("rejects invalid values", () => {
  expect(() => loadServerConfig({ PORT: "eighty" })).toThrow("invalid PORT: eighty");
  expect(() => loadServerConfig({ PORT: "70000" })).toThrow("invalid PORT: 70000");
  expect(() => loadServerConfig({ TIDEPOOL_MAX_PAYLOAD_BYTES: "0" })).toThrow("invalid TIDEPOOL_MAX_PAYLOAD_BYTES: 0");
  expect(() => loadServerConfig({ TIDEPOOL_LOG_LEVEL: "loud" })).toThrow("invalid TIDEPOOL_LOG_LEVEL: loud");
  expect(() => loadServerConfig({ TIDEPOOL_PEERS: "http://x" })).toThrow("invalid TIDEPOOL_PEERS entry: http://x");
  expect(() => loadServerConfig({ TIDEPOOL_PEERS: "b=http://x" })).toThrow("invalid TIDEPOOL_PEERS entry: b=http://x");
});
