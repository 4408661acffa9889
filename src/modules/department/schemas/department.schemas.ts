import { z } from "zod";
import { departmentReviewActions, priorities } from "../../../utils/constants.js";
import { queueQuerySchema } from "../../../utils/queue.js";
import { amountSchema, remarksSchema } from "../../applications/schemas/applications.schemas.js";

export const departmentReviewSchema = z.object({
  action: z.enum(departmentReviewActions),
  remarks: remarksSchema,
  finalAmount: amountSchema.optional(),
});
export type DepartmentReviewPayload = z.infer<typeof departmentReviewSchema>;

export const forwardToFinanceSchema = z.object({
  applicationIds: z.array(z.string().trim().min(1)).min(1).max(100),
  remarks: remarksSchema,
  priority: z.enum(priorities).default("medium"),
});
export type ForwardToFinancePayload = z.infer<typeof forwardToFinanceSchema>;

export const departmentQueueQuerySchema = queueQuerySchema;
export type DepartmentQueueQuery = z.infer<typeof departmentQueueQuerySchema>;
