import mongoose, { Schema, type Types } from "mongoose";
import {
  disbursementMethods,
  disbursementStatuses,
  type DisbursementMethod,
  type DisbursementStatus,
} from "../../utils/constants.js";
import { bankAccountSchema, engineOwned } from "./_shared.js";

export interface DisbursementDoc {
  disbursementId: string;
  applicationId: string;
  /** Mirrors applicationId until the disbursement is cancelled, then null. */
  activeApplicationId: string | null;
  amount: Types.Decimal128;
  method: DisbursementMethod;
  status: DisbursementStatus;
  bankAccount: { accountNumber?: string | null; routingCode?: string | null };
  transactionReference: string | null;
  failureReason: string | null;
  batchId: string | null;
  attempts: number;
  disbursedAt: Date | null;
  remarks: string[];
  createdBy: string;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const disbursementSchema = new Schema<DisbursementDoc>(
  {
    disbursementId: { type: String, required: true, unique: true },
    applicationId: { type: String, required: true, index: true },
    activeApplicationId: { type: String, default: null },
    amount: { type: Schema.Types.Decimal128, required: true },
    method: { type: String, enum: disbursementMethods, required: true },
    status: { type: String, enum: disbursementStatuses, required: true, index: true },
    bankAccount: { type: bankAccountSchema, default: {} },
    transactionReference: { type: String, default: null },
    failureReason: { type: String, default: null },
    batchId: { type: String, default: null },
    attempts: { type: Number, default: 0 },
    disbursedAt: { type: Date, default: null },
    remarks: [{ type: String }],
    createdBy: { type: String, required: true },
    version: { type: Number, required: true },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { ...engineOwned, collection: "disbursements" },
);
// At most one non-cancelled disbursement per application
disbursementSchema.index(
  { activeApplicationId: 1 },
  { unique: true, partialFilterExpression: { activeApplicationId: { $type: "string" } } },
);

export const DisbursementModel =
  (mongoose.models.Disbursement as mongoose.Model<DisbursementDoc> | undefined) ??
  mongoose.model<DisbursementDoc>("Disbursement", disbursementSchema);
