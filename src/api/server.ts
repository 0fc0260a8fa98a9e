import Fastify from "fastify";
import cors from "@fastify/cors";

import { Config } from "../config";
import { InvalidFormatError, LedgerError, isInputValidationError } from "../errors";
import { ReportService } from "../services/aggregationService";
import { InterchangeService } from "../services/interchangeService";
import { QueryService } from "../services/queryService";
import { LedgerStore } from "../services/storeService";
import { Logger } from "../utils/logger";
import { healthRoutes } from "./routes/health";
import { interchangeRoutes } from "./routes/interchange";
import { reportRoutes } from "./routes/reports";
import { transactionRoutes } from "./routes/transactions";

export interface ServerDependencies {
  store: LedgerStore;
  config: Config;
  logger: Logger;
}

export async function createServer({ store, config, logger }: ServerDependencies) {
  const server = Fastify({
    logger: { level: config.logging.level },
  });

  const queryService = new QueryService(store);
  const reportService = new ReportService(queryService);
  const interchangeService = new InterchangeService(store, logger);

  server.setErrorHandler((error, req, reply) => {
    // A corrupt stored row is a server fault and falls through to 500
    if (isInputValidationError(error) || error instanceof InvalidFormatError) {
      return reply.status(400).send({ error: error.message, kind: error.kind });
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.message });
    }

    req.log.error({ err: error }, "Request failed");

    return reply.status(500).send({
      error: "Internal server error",
      ...(error instanceof LedgerError && { kind: error.kind }),
    });
  });

  await server.register(cors, { origin: true });

  await server.register(transactionRoutes, { store, queryService });
  await server.register(reportRoutes, { reportService });
  await server.register(interchangeRoutes, {
    interchangeService,
    exportDir: config.ledger.exportDir,
  });
  await server.register(healthRoutes, { store });

  return server;
}
