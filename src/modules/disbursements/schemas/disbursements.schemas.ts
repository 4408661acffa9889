import { z } from "zod";
import { disbursementMethods } from "../../../utils/constants.js";
import { bankAccountSchema, remarksSchema } from "../../applications/schemas/applications.schemas.js";

const idList = z.array(z.string().trim().min(1)).min(1).max(100);

export const disbursementIdParamsSchema = z.object({
  id: z.string().trim().min(1),
});

export const createDisbursementsSchema = z
  .object({
    applicationId: z.string().trim().min(1).optional(),
    applicationIds: idList.optional(),
    method: z.enum(disbursementMethods).default("bank_transfer"),
    remarks: remarksSchema,
  })
  .refine((body) => (body.applicationId === undefined) !== (body.applicationIds === undefined), {
    message: "Provide exactly one of applicationId or applicationIds",
    path: ["applicationIds"],
  });
export type CreateDisbursementsPayload = z.infer<typeof createDisbursementsSchema>;

export const bulkTransferSchema = z.object({
  disbursementIds: idList,
});
export type BulkTransferPayload = z.infer<typeof bulkTransferSchema>;

export const cancelDisbursementSchema = z.object({
  remarks: z.string().trim().min(1, "Remarks are required to cancel").max(2000),
});
export type CancelDisbursementPayload = z.infer<typeof cancelDisbursementSchema>;

export const updateBankDetailsSchema = bankAccountSchema.refine(
  (body) => body.accountNumber !== undefined || body.routingCode !== undefined,
  { message: "Provide accountNumber or routingCode" },
);
export type UpdateBankDetailsPayload = z.infer<typeof updateBankDetailsSchema>;

export const settleDisbursementSchema = z.object({
  transactionReference: z.string().trim().min(1).max(100),
  remarks: remarksSchema,
});
export type SettleDisbursementPayload = z.infer<typeof settleDisbursementSchema>;

export const reconcileTransferSchema = z.discriminatedUnion("outcome", [
  z.object({
    outcome: z.literal("succeeded"),
    transactionReference: z.string().trim().min(1).max(100),
    remarks: remarksSchema,
  }),
  z.object({
    outcome: z.literal("failed"),
    reason: z.string().trim().min(1).max(500),
    remarks: remarksSchema,
  }),
]);
export type ReconcileTransferPayload = z.infer<typeof reconcileTransferSchema>;
