import type { FastifyInstance } from "fastify";
import { createDepartmentController } from "../controllers/department.controller.js";

export async function departmentRoutes(app: FastifyInstance) {
  const controller = createDepartmentController();

  app.get("/v1/department/queue", { preHandler: [app.authenticate] }, controller.queue);
  app.post(
    "/v1/department/applications/:id/review",
    { preHandler: [app.authenticate] },
    controller.review,
  );
  app.post("/v1/department/forward", { preHandler: [app.authenticate] }, controller.forward);
}
