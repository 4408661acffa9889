import mongoose, { Schema, type Types } from "mongoose";
import {
  applicationStatuses,
  decisionActions,
  roles,
  stages,
  type ApplicationStatus,
  type DecisionAction,
  type Role,
  type Stage,
} from "../../utils/constants.js";
import { engineOwned } from "./_shared.js";

export interface DecisionLogDoc {
  entryId: string;
  applicationId: string;
  sequence: number;
  stage: Stage;
  action: DecisionAction;
  fromStatus: ApplicationStatus | null;
  toStatus: ApplicationStatus | null;
  actorId: string;
  actorRole: Role;
  remarks: string;
  amount: Types.Decimal128 | null;
  metadata: Record<string, string | number | boolean | null> | null;
  recordedAt: Date;
}

const decisionLogSchema = new Schema<DecisionLogDoc>(
  {
    entryId: { type: String, required: true, unique: true },
    applicationId: { type: String, required: true },
    sequence: { type: Number, required: true },
    stage: { type: String, enum: stages, required: true },
    action: { type: String, enum: decisionActions, required: true },
    fromStatus: { type: String, enum: applicationStatuses, default: null },
    toStatus: { type: String, enum: applicationStatuses, default: null },
    actorId: { type: String, required: true },
    actorRole: { type: String, enum: roles, required: true },
    remarks: { type: String, default: "" },
    amount: { type: Schema.Types.Decimal128, default: null },
    metadata: { type: Schema.Types.Mixed, default: null },
    recordedAt: { type: Date, required: true },
  },
  { ...engineOwned, collection: "decisionLog" },
);
// Appends race on the sequence; the loser retries from a fresh read.
decisionLogSchema.index({ applicationId: 1, sequence: 1 }, { unique: true });

export const DecisionLogModel =
  (mongoose.models.DecisionLog as mongoose.Model<DecisionLogDoc> | undefined) ??
  mongoose.model<DecisionLogDoc>("DecisionLog", decisionLogSchema);
