import type { FastifyRequest } from "fastify";
import { authorize } from "../../../utils/rbac.js";
import { serialize } from "../../../utils/serialize.js";
import { runRequestCommand } from "../../../utils/idempotency.js";
import { applicationIdParamsSchema } from "../../applications/schemas/applications.schemas.js";
import { calculateAmountSchema, financeQueueQuerySchema } from "../schemas/finance.schemas.js";
import { calculateAmount, listFinanceQueue } from "../services/calculation.service.js";

export function createFinanceController() {
  return {
    calculate: async (request: FastifyRequest) => {
      const payload = calculateAmountSchema.parse(request.body ?? {});
      authorize(request.authUser, payload.apply ? "update" : "read", "calculation");
      const params = applicationIdParamsSchema.parse(request.params);
      if (!payload.apply) {
        return serialize(await calculateAmount(request.server.engine, request.authUser, params.id, payload));
      }
      return runRequestCommand(
        request,
        "POST:/v1/finance/applications/:id/calculate",
        { id: params.id, ...payload },
        async () => serialize(await calculateAmount(request.server.engine, request.authUser, params.id, payload)),
      );
    },

    queue: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "disbursement");
      const query = financeQueueQuerySchema.parse(request.query);
      const page = await listFinanceQueue(request.server.engine, request.authUser, query);
      return serialize(page);
    },
  };
}
