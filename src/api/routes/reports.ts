import { FastifyInstance } from "fastify";
import { filtersSchema } from "../middleware/validation";
import { ReportService } from "../../services/aggregationService";

export type ReportRoutesOptions = {
  reportService: ReportService;
};

export async function reportRoutes(app: FastifyInstance, { reportService }: ReportRoutesOptions) {
  app.get("/api/reports/summary", async (req, reply) => {
    const parsed = filtersSchema.safeParse(req.query);

    if (!parsed.success) {
      return reply.status(400).send({
        error: "Invalid query parameters",
        details: parsed.error.errors,
      });
    }

    return reply.status(200).send(await reportService.summary(parsed.data));
  });

  app.get("/api/reports/breakdown", async (req, reply) => {
    const parsed = filtersSchema.safeParse(req.query);

    if (!parsed.success) {
      return reply.status(400).send({
        error: "Invalid query parameters",
        details: parsed.error.errors,
      });
    }

    return reply.status(200).send(await reportService.breakdown(parsed.data));
  });
}
