import { FastifyInstance } from "fastify";
import { LedgerStore } from "../../services/storeService";

export type HealthRoutesOptions = {
  store: LedgerStore;
};

export async function healthRoutes(app: FastifyInstance, { store }: HealthRoutesOptions) {
  app.get("/api/health", async () => {
    const transactions = await store.count();

    return {
      status: "healthy",
      timestamp: new Date().toISOString(),
      ledger: {
        file: store.dataFile,
        transactions,
      },
    };
  });
}
