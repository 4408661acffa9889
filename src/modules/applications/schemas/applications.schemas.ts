import { z } from "zod";
import {
  applicationStatuses,
  courseLevels,
  priorities,
  scholarshipTypes,
} from "../../../utils/constants.js";
import { isCentPrecise } from "../../../utils/money.js";

export const amountSchema = z
  .number()
  .positive()
  .max(100_000_000)
  .refine(isCentPrecise, "Amounts carry at most two decimal places");

export const remarksSchema = z.string().trim().max(2000).default("");

export const applicationIdParamsSchema = z.object({
  id: z.string().trim().min(1),
});

export const bankAccountSchema = z.object({
  accountNumber: z.string().trim().regex(/^\d{6,20}$/, "Account number must be 6-20 digits").optional(),
  routingCode: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z]{4}0[A-Z0-9]{6}$/, "Routing code must be an 11 character IFSC code")
    .optional(),
});

export const createApplicationSchema = z.object({
  studentId: z.string().trim().min(1).optional(),
  instituteId: z.string().trim().min(1),
  departmentId: z.string().trim().min(1),
  scholarshipType: z.enum(scholarshipTypes),
  scholarshipName: z.string().trim().min(2).max(200),
  schemeReference: z.string().trim().min(1).max(100).optional(),
  requestedAmount: amountSchema,
  academicYear: z
    .string()
    .trim()
    .regex(/^\d{4}-\d{2,4}$/, "Academic year looks like 2024-25")
    .optional(),
  priority: z.enum(priorities).default("medium"),
  eligibilityScore: z.number().min(0).max(100).default(0),
  documentCompletenessScore: z.number().min(0).max(100).default(0),
  studentProfile: z
    .object({
      cgpa: z.number().min(0).max(10).optional(),
      courseLevel: z.enum(courseLevels).optional(),
    })
    .default({}),
  bankAccount: bankAccountSchema.default({}),
  submit: z.boolean().default(false),
});
export type CreateApplicationPayload = z.infer<typeof createApplicationSchema>;

export const submitApplicationSchema = z.object({
  remarks: remarksSchema,
});
export type SubmitApplicationPayload = z.infer<typeof submitApplicationSchema>;

export const transitionApplicationSchema = z.object({
  targetStatus: z.enum(applicationStatuses),
  remarks: remarksSchema,
});
export type TransitionApplicationPayload = z.infer<typeof transitionApplicationSchema>;

export const completeApplicationSchema = z.object({
  remarks: remarksSchema,
});
export type CompleteApplicationPayload = z.infer<typeof completeApplicationSchema>;
