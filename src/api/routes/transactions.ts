import { FastifyInstance } from "fastify";
import {
  createTransactionSchema,
  filtersSchema,
  transactionIdSchema,
  updateTransactionSchema,
} from "../middleware/validation";
import { LedgerStore } from "../../services/storeService";
import { QueryService } from "../../services/queryService";

export type TransactionRoutesOptions = {
  store: LedgerStore;
  queryService: QueryService;
};

export async function transactionRoutes(
  app: FastifyInstance,
  { store, queryService }: TransactionRoutesOptions
) {
  /**
   * POST /api/transactions
   * Validate and append a transaction; the store assigns the id
   */
  app.post("/api/transactions", async (req, reply) => {
    const parsed = createTransactionSchema.safeParse(req.body);

    if (!parsed.success) {
      return reply.status(400).send({
        error: "Invalid request payload",
        details: parsed.error.errors,
      });
    }

    const transaction = await store.add(parsed.data);

    return reply.status(201).send(transaction);
  });

  /**
   * GET /api/transactions
   * Filtered listing in ledger order
   */
  app.get("/api/transactions", async (req, reply) => {
    const parsed = filtersSchema.safeParse(req.query);

    if (!parsed.success) {
      return reply.status(400).send({
        error: "Invalid query parameters",
        details: parsed.error.errors,
      });
    }

    return reply.status(200).send(await queryService.query(parsed.data));
  });

  app.get("/api/transactions/:id", async (req, reply) => {
    const params = transactionIdSchema.safeParse(req.params);

    if (!params.success) {
      return reply.status(400).send({
        error: "Invalid transaction id",
        details: params.error.errors,
      });
    }

    const transaction = await store.getById(params.data.id);

    if (!transaction) {
      return reply.status(404).send({
        error: "Transaction not found",
      });
    }

    return reply.status(200).send(transaction);
  });

  /**
   * PATCH /api/transactions/:id
   * Replace the supplied fields; the row is left as it was if the result is invalid
   */
  app.patch("/api/transactions/:id", async (req, reply) => {
    const params = transactionIdSchema.safeParse(req.params);
    const parsed = updateTransactionSchema.safeParse(req.body);

    if (!params.success || !parsed.success) {
      return reply.status(400).send({
        error: "Invalid request payload",
        details: [
          ...(params.success ? [] : params.error.errors),
          ...(parsed.success ? [] : parsed.error.errors),
        ],
      });
    }

    const outcome = await store.applyUpdate(params.data.id, parsed.data);

    switch (outcome.status) {
      case "not-found":
        return reply.status(404).send({
          error: "Transaction not found",
        });
      case "invalid":
        return reply.status(400).send({
          error: "Update rejected: the resulting transaction is invalid",
          kind: outcome.error.kind,
        });
      case "updated":
        return reply.status(200).send(outcome.transaction);
    }
  });

  app.delete("/api/transactions/:id", async (req, reply) => {
    const params = transactionIdSchema.safeParse(req.params);

    if (!params.success) {
      return reply.status(400).send({
        error: "Invalid transaction id",
        details: params.error.errors,
      });
    }

    const deleted = await store.delete(params.data.id);

    if (!deleted) {
      return reply.status(404).send({
        error: "Transaction not found",
      });
    }

    return reply.status(204).send();
  });
}
