import { createLogger } from "@tidepool/store";

import { loadServerConfig } from "./config.js";
import { startSyncNode } from "./node.js";

async function main() {
  const config = loadServerConfig(process.env);
  const logger = createLogger({ level: config.logLevel, name: "tidepool", pretty: process.stdout.isTTY });
  const node = await startSyncNode(config, { logger });
  const { host, port } = node.server;
  logger.info(
    { node: node.store.context.actor, health: `http://${host}:${port}/health`, sync: `ws://${host}:${port}/sync?peer=YOUR_NODE_ID` },
    "tidepool sync server ready",
  );

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    node.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
