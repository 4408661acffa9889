import type { FastifyInstance } from "fastify";
import { createDisbursementController } from "../controllers/disbursements.controller.js";

export async function disbursementRoutes(app: FastifyInstance) {
  const controller = createDisbursementController();

  app.post("/v1/finance/disbursements", { preHandler: [app.authenticate] }, controller.create);
  // Literal path before :id routes
  app.post(
    "/v1/finance/disbursements/transfer",
    { preHandler: [app.authenticate] },
    controller.bulkTransfer,
  );
  app.get("/v1/finance/disbursements/:id", { preHandler: [app.authenticate] }, controller.getById);
  app.post(
    "/v1/finance/disbursements/:id/transfer",
    { preHandler: [app.authenticate] },
    controller.transfer,
  );
  app.post(
    "/v1/finance/disbursements/:id/cancel",
    { preHandler: [app.authenticate] },
    controller.cancel,
  );
  app.patch(
    "/v1/finance/disbursements/:id/bank-details",
    { preHandler: [app.authenticate] },
    controller.updateBankDetails,
  );
  app.post(
    "/v1/finance/disbursements/:id/settle",
    { preHandler: [app.authenticate] },
    controller.settle,
  );
  app.post(
    "/v1/finance/disbursements/:id/reconcile",
    { preHandler: [app.authenticate] },
    controller.reconcile,
  );
}
