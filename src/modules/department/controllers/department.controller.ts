import type { FastifyRequest } from "fastify";
import { authorize } from "../../../utils/rbac.js";
import { serialize } from "../../../utils/serialize.js";
import { runRequestCommand } from "../../../utils/idempotency.js";
import { applicationIdParamsSchema } from "../../applications/schemas/applications.schemas.js";
import {
  departmentQueueQuerySchema,
  departmentReviewSchema,
  forwardToFinanceSchema,
} from "../schemas/department.schemas.js";
import {
  departmentReview,
  forwardToFinance,
  listDepartmentQueue,
} from "../services/department-review.service.js";

export function createDepartmentController() {
  return {
    review: async (request: FastifyRequest) => {
      authorize(request.authUser, "approve", "application");
      const params = applicationIdParamsSchema.parse(request.params);
      const payload = departmentReviewSchema.parse(request.body);
      return runRequestCommand(
        request,
        "POST:/v1/department/applications/:id/review",
        { id: params.id, ...payload },
        async () => serialize(await departmentReview(request.server.engine, request.authUser, params.id, payload)),
      );
    },

    queue: async (request: FastifyRequest) => {
      authorize(request.authUser, "approve", "application");
      const query = departmentQueueQuerySchema.parse(request.query);
      const page = await listDepartmentQueue(request.server.engine, request.authUser, query);
      return serialize(page);
    },

    forward: async (request: FastifyRequest) => {
      authorize(request.authUser, "forward", "application");
      const payload = forwardToFinanceSchema.parse(request.body);
      return runRequestCommand(request, "POST:/v1/department/forward", payload, async () =>
        serialize(await forwardToFinance(request.server.engine, request.authUser, payload)),
      );
    },
  };
}
