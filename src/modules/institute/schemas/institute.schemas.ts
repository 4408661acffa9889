import { z } from "zod";
import { instituteReviewActions } from "../../../utils/constants.js";
import { amountSchema, remarksSchema } from "../../applications/schemas/applications.schemas.js";

export const reviewApplicationSchema = z.object({
  action: z.enum(instituteReviewActions),
  remarks: remarksSchema,
  approvedAmount: amountSchema.optional(),
});
export type ReviewApplicationPayload = z.infer<typeof reviewApplicationSchema>;

export const bulkReviewSchema = z.object({
  applicationIds: z.array(z.string().trim().min(1)).min(1).max(100),
  action: z.enum(instituteReviewActions),
  remarks: remarksSchema,
});
export type BulkReviewPayload = z.infer<typeof bulkReviewSchema>;

// Decisions go through review; this moves between the working states only.
export const instituteTransitionSchema = z.object({
  targetStatus: z.enum(["under_review", "document_verification", "eligibility_check", "on_hold"]),
  remarks: remarksSchema,
});
export type InstituteTransitionPayload = z.infer<typeof instituteTransitionSchema>;
