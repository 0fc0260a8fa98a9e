import { promises as fs } from "fs";
import path from "path";
import { FastifyInstance } from "fastify";
import { exportSchema, importSchema } from "../middleware/validation";
import { InterchangeService } from "../../services/interchangeService";

export type InterchangeRoutesOptions = {
  interchangeService: InterchangeService;
  exportDir: string;
};

export async function interchangeRoutes(
  app: FastifyInstance,
  { interchangeService, exportDir }: InterchangeRoutesOptions
) {
  /**
   * POST /api/backups
   * Timestamped copy next to the ledger file
   */
  app.post("/api/backups", async (_req, reply) => {
    const backupPath = await interchangeService.backup();
    return reply.status(201).send({ path: backupPath });
  });

  /**
   * POST /api/exports
   * Files are always written inside the export directory
   */
  app.post("/api/exports", async (req, reply) => {
    const parsed = exportSchema.safeParse(req.body);

    if (!parsed.success) {
      return reply.status(400).send({
        error: "Invalid request payload",
        details: parsed.error.errors,
      });
    }

    const target = path.join(exportDir, parsed.data.filename);
    await fs.mkdir(exportDir, { recursive: true });

    if (parsed.data.format === "json") {
      await interchangeService.exportJson(target);
    } else {
      await interchangeService.exportTabular(target);
    }

    return reply.status(201).send({ path: target });
  });

  app.post("/api/imports", async (req, reply) => {
    const parsed = importSchema.safeParse(req.body);

    if (!parsed.success) {
      return reply.status(400).send({
        error: "Invalid request payload",
        details: parsed.error.errors,
      });
    }

    const source = path.join(exportDir, parsed.data.filename);

    try {
      await fs.access(source);
    } catch {
      return reply.status(404).send({
        error: "Import file not found",
      });
    }

    const imported = await interchangeService.importJson(source);

    return reply.status(200).send({ imported });
  });
}
