import type { FastifyRequest } from "fastify";
import { authorize } from "../../../utils/rbac.js";
import { serialize } from "../../../utils/serialize.js";
import { runRequestCommand } from "../../../utils/idempotency.js";
import { applicationIdParamsSchema } from "../../applications/schemas/applications.schemas.js";
import {
  bulkReviewSchema,
  instituteTransitionSchema,
  reviewApplicationSchema,
} from "../schemas/institute.schemas.js";
import { bulkReview, instituteTransition, reviewApplication } from "../services/institute-review.service.js";

export function createInstituteController() {
  return {
    review: async (request: FastifyRequest) => {
      authorize(request.authUser, "review", "application");
      const params = applicationIdParamsSchema.parse(request.params);
      const payload = reviewApplicationSchema.parse(request.body);
      return runRequestCommand(
        request,
        "POST:/v1/institute/applications/:id/review",
        { id: params.id, ...payload },
        async () => serialize(await reviewApplication(request.server.engine, request.authUser, params.id, payload)),
      );
    },

    bulkReview: async (request: FastifyRequest) => {
      authorize(request.authUser, "review", "application");
      const payload = bulkReviewSchema.parse(request.body);
      return runRequestCommand(request, "POST:/v1/institute/applications/bulk-review", payload, async () =>
        serialize(await bulkReview(request.server.engine, request.authUser, payload)),
      );
    },

    transition: async (request: FastifyRequest) => {
      authorize(request.authUser, "transition", "application");
      const params = applicationIdParamsSchema.parse(request.params);
      const payload = instituteTransitionSchema.parse(request.body);
      return runRequestCommand(
        request,
        "POST:/v1/institute/applications/:id/transition",
        { id: params.id, ...payload },
        async () =>
          serialize(await instituteTransition(request.server.engine, request.authUser, params.id, payload)),
      );
    },
  };
}
