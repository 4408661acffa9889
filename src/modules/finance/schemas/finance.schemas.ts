import { z } from "zod";
import {
  calculationStrategies,
  courseLevels,
  locationTypes,
  socialCategories,
} from "../../../utils/constants.js";
import { COMBINED_MULTIPLIER } from "../services/amount-calculator.js";
import { queueQuerySchema } from "../../../utils/queue.js";

const factorTable = z.record(z.string().trim().min(1).max(50), z.number().finite()).refine(
  (table) => Object.keys(table).length <= 20,
  { message: "At most 20 entries" },
);

export const calculationFactorsSchema = z
  .object({
    cgpa: z.number().min(0).max(10).optional(),
    courseLevel: z.enum(courseLevels).optional(),
    familyIncome: z.number().nonnegative().optional(),
    category: z.enum(socialCategories).optional(),
    locationType: z.enum(locationTypes).optional(),
    multipliers: factorTable
      .refine((table) => !Object.keys(table).includes(COMBINED_MULTIPLIER), {
        message: `"${COMBINED_MULTIPLIER}" is reserved for the combined multiplier`,
      })
      .optional(),
    adjustments: factorTable.optional(),
  })
  .strict();
export type CalculationFactorsPayload = z.infer<typeof calculationFactorsSchema>;

export const calculateAmountSchema = z.object({
  strategy: z.enum(calculationStrategies).default("standard"),
  customFactors: calculationFactorsSchema.default({}),
  apply: z.boolean().default(false),
});
export type CalculateAmountPayload = z.infer<typeof calculateAmountSchema>;

export const financeQueueQuerySchema = queueQuerySchema;
export type FinanceQueueQuery = z.infer<typeof financeQueueQuerySchema>;
