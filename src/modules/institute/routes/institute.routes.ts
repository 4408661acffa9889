import type { FastifyInstance } from "fastify";
import { createInstituteController } from "../controllers/institute.controller.js";

export async function instituteRoutes(app: FastifyInstance) {
  const controller = createInstituteController();

  // Literal path before :id so bulk-review isn't captured as an id
  app.post(
    "/v1/institute/applications/bulk-review",
    { preHandler: [app.authenticate] },
    controller.bulkReview,
  );
  app.post(
    "/v1/institute/applications/:id/review",
    { preHandler: [app.authenticate] },
    controller.review,
  );
  app.post(
    "/v1/institute/applications/:id/transition",
    { preHandler: [app.authenticate] },
    controller.transition,
  );
}
