import { promises as fs } from "fs";
import path from "path";
import { createServer } from "./api/server";
import { loadConfig } from "./config";
import { LedgerStore } from "./services/storeService";
import { createLogger } from "./utils/logger";

const config = loadConfig();
const logger = createLogger(config.logging);

async function start() {
  await fs.mkdir(path.dirname(config.ledger.dataFile), { recursive: true });

  // Migration, if any, has to finish before the API accepts writes
  const store = new LedgerStore({ dataFile: config.ledger.dataFile, logger });
  await store.initialize();

  const server = await createServer({ store, config, logger });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      }
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.listen({ port: config.server.port, host: config.server.host });
}

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start ledger service");
  process.exit(1);
});
