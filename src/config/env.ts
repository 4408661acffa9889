import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const emptyToUndefined = <T>(schema: z.ZodType<T>) =>
  z.preprocess((value) => {
    if (typeof value === "string" && value.trim().length === 0)
      return undefined;
    return value;
  }, schema);

// z.coerce.boolean() treats "false" as true
const booleanFlag = (fallback: boolean) =>
  emptyToUndefined(z.enum(["true", "false", "1", "0"]).optional())
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));

const schema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().default(4000),
  MONGODB_URI: z.string().min(1),
  MONGODB_DB_NAME: z.string().min(1).default("scholarship_engine"),
  ALLOWED_ORIGINS: z.string().min(1),
  JWT_SECRET: z.string().min(32),
  APPLICATION_SLA_DAYS: z.coerce.number().int().positive().default(30),
  ENFORCE_APPROVED_AMOUNT_CEILING: booleanFlag(true),
  STORE_MAX_CONFLICT_RETRIES: z.coerce.number().int().positive().max(10).default(3),
  TRANSFER_GATEWAY_URL: emptyToUndefined(z.string().url().optional()),
  TRANSFER_GATEWAY_API_KEY: emptyToUndefined(z.string().min(8).optional()),
  TRANSFER_GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
});

const parsed = schema.safeParse(process.env);
if (!parsed.success) {
  console.error(parsed.error.flatten().fieldErrors);
  throw new Error("Invalid environment configuration");
}

export const env = parsed.data;

export type Env = typeof env;
