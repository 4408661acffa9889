import type { FastifyRequest } from "fastify";
import { authorize } from "../../../utils/rbac.js";
import { serialize } from "../../../utils/serialize.js";
import { runRequestCommand } from "../../../utils/idempotency.js";
import {
  applicationIdParamsSchema,
  completeApplicationSchema,
  createApplicationSchema,
  submitApplicationSchema,
} from "../schemas/applications.schemas.js";
import {
  completeApplication,
  createApplication,
  getApplication,
  getDecisionLog,
  submitApplication,
} from "../services/applications.service.js";

export function createApplicationController() {
  return {
    create: async (request: FastifyRequest) => {
      authorize(request.authUser, "create", "application");
      const payload = createApplicationSchema.parse(request.body);
      return runRequestCommand(request, "POST:/v1/applications", payload, async () =>
        serialize(await createApplication(request.server.engine, request.authUser, payload)),
      );
    },

    getById: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "application");
      const params = applicationIdParamsSchema.parse(request.params);
      const details = await getApplication(request.server.engine, request.authUser, params.id);
      return serialize(details);
    },

    decisionLog: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "decision_log");
      const params = applicationIdParamsSchema.parse(request.params);
      const log = await getDecisionLog(request.server.engine, request.authUser, params.id);
      return serialize(log);
    },

    submit: async (request: FastifyRequest) => {
      authorize(request.authUser, "submit", "application");
      const params = applicationIdParamsSchema.parse(request.params);
      const payload = submitApplicationSchema.parse(request.body ?? {});
      return runRequestCommand(request, "POST:/v1/applications/:id/submit", { id: params.id, ...payload }, async () =>
        serialize(await submitApplication(request.server.engine, request.authUser, params.id, payload)),
      );
    },

    complete: async (request: FastifyRequest) => {
      authorize(request.authUser, "complete", "application");
      const params = applicationIdParamsSchema.parse(request.params);
      const payload = completeApplicationSchema.parse(request.body ?? {});
      return runRequestCommand(
        request,
        "POST:/v1/finance/applications/:id/complete",
        { id: params.id, ...payload },
        async () => serialize(await completeApplication(request.server.engine, request.authUser, params.id, payload)),
      );
    },
  };
}
