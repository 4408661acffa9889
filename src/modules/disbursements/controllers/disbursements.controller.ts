import type { FastifyRequest } from "fastify";
import { authorize } from "../../../utils/rbac.js";
import { serialize } from "../../../utils/serialize.js";
import { runRequestCommand } from "../../../utils/idempotency.js";
import {
  bulkTransferSchema,
  cancelDisbursementSchema,
  createDisbursementsSchema,
  disbursementIdParamsSchema,
  reconcileTransferSchema,
  settleDisbursementSchema,
  updateBankDetailsSchema,
} from "../schemas/disbursements.schemas.js";
import {
  bulkTransfer,
  cancelDisbursement,
  createAndTransferDisbursement,
  executeTransfer,
  getDisbursement,
  reconcileTransfer,
  retryTransfer,
  settleManually,
  updateBankDetails,
} from "../services/disbursements.service.js";

export function createDisbursementController() {
  return {
    create: async (request: FastifyRequest) => {
      authorize(request.authUser, "create", "disbursement");
      const payload = createDisbursementsSchema.parse(request.body);
      return runRequestCommand(request, "POST:/v1/finance/disbursements", payload, async () =>
        serialize(await createAndTransferDisbursement(request.server.engine, request.authUser, payload)),
      );
    },

    getById: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "disbursement");
      const params = disbursementIdParamsSchema.parse(request.params);
      const disbursement = await getDisbursement(request.server.engine, request.authUser, params.id);
      return serialize(disbursement);
    },

    /** Sends a pending transfer, or retries a failed one. */
    transfer: async (request: FastifyRequest) => {
      authorize(request.authUser, "execute", "disbursement");
      const params = disbursementIdParamsSchema.parse(request.params);
      const ctx = request.server.engine;
      return runRequestCommand(request, "POST:/v1/finance/disbursements/:id/transfer", { id: params.id }, async () => {
        const current = await getDisbursement(ctx, request.authUser, params.id);
        const settled =
          current.status === "failed"
            ? await retryTransfer(ctx, request.authUser, params.id)
            : await executeTransfer(ctx, request.authUser, params.id);
        return serialize(settled);
      });
    },

    bulkTransfer: async (request: FastifyRequest) => {
      authorize(request.authUser, "execute", "disbursement");
      const payload = bulkTransferSchema.parse(request.body);
      return runRequestCommand(request, "POST:/v1/finance/disbursements/transfer", payload, async () =>
        serialize(await bulkTransfer(request.server.engine, request.authUser, payload)),
      );
    },

    cancel: async (request: FastifyRequest) => {
      authorize(request.authUser, "update", "disbursement");
      const params = disbursementIdParamsSchema.parse(request.params);
      const payload = cancelDisbursementSchema.parse(request.body);
      return runRequestCommand(
        request,
        "POST:/v1/finance/disbursements/:id/cancel",
        { id: params.id, ...payload },
        async () => serialize(await cancelDisbursement(request.server.engine, request.authUser, params.id, payload)),
      );
    },

    updateBankDetails: async (request: FastifyRequest) => {
      authorize(request.authUser, "update", "disbursement");
      const params = disbursementIdParamsSchema.parse(request.params);
      const payload = updateBankDetailsSchema.parse(request.body);
      return runRequestCommand(
        request,
        "PATCH:/v1/finance/disbursements/:id/bank-details",
        { id: params.id, ...payload },
        async () => serialize(await updateBankDetails(request.server.engine, request.authUser, params.id, payload)),
      );
    },

    settle: async (request: FastifyRequest) => {
      authorize(request.authUser, "execute", "disbursement");
      const params = disbursementIdParamsSchema.parse(request.params);
      const payload = settleDisbursementSchema.parse(request.body);
      return runRequestCommand(
        request,
        "POST:/v1/finance/disbursements/:id/settle",
        { id: params.id, ...payload },
        async () => serialize(await settleManually(request.server.engine, request.authUser, params.id, payload)),
      );
    },

    reconcile: async (request: FastifyRequest) => {
      authorize(request.authUser, "execute", "disbursement");
      const params = disbursementIdParamsSchema.parse(request.params);
      const payload = reconcileTransferSchema.parse(request.body);
      return runRequestCommand(
        request,
        "POST:/v1/finance/disbursements/:id/reconcile",
        { id: params.id, ...payload },
        async () => serialize(await reconcileTransfer(request.server.engine, request.authUser, params.id, payload)),
      );
    },
  };
}
