import type { FastifyInstance } from "fastify";
import { createApplicationController } from "../controllers/applications.controller.js";

export async function applicationRoutes(app: FastifyInstance) {
  const controller = createApplicationController();

  app.post("/v1/applications", { preHandler: [app.authenticate] }, controller.create);
  app.get("/v1/applications/:id", { preHandler: [app.authenticate] }, controller.getById);
  app.get(
    "/v1/applications/:id/decision-log",
    { preHandler: [app.authenticate] },
    controller.decisionLog,
  );
  app.post(
    "/v1/applications/:id/submit",
    { preHandler: [app.authenticate] },
    controller.submit,
  );
  app.post(
    "/v1/finance/applications/:id/complete",
    { preHandler: [app.authenticate] },
    controller.complete,
  );
}
