import type { FastifyInstance } from "fastify";
import { createFinanceController } from "../controllers/finance.controller.js";

export async function financeRoutes(app: FastifyInstance) {
  const controller = createFinanceController();

  app.get("/v1/finance/queue", { preHandler: [app.authenticate] }, controller.queue);
  app.post(
    "/v1/finance/applications/:id/calculate",
    { preHandler: [app.authenticate] },
    controller.calculate,
  );
}
