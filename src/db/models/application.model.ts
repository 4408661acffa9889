import mongoose, { Schema, type Types } from "mongoose";
import {
  applicationStatuses,
  courseLevels,
  priorities,
  scholarshipTypes,
  type ApplicationStatus,
  type CourseLevel,
  type Priority,
  type ScholarshipType,
} from "../../utils/constants.js";
import { bankAccountSchema, engineOwned } from "./_shared.js";

export interface StageDecisionDoc {
  decided: boolean;
  outcome: "approved" | "rejected" | null;
  actorId: string | null;
  remarks: string | null;
  amount: Types.Decimal128 | null;
  decidedAt: Date | null;
}

export interface FinanceForwardDoc {
  forwarded: boolean;
  actorId: string | null;
  remarks: string | null;
  priority: Priority | null;
  batchId: string | null;
  amount: Types.Decimal128 | null;
  forwardedAt: Date | null;
}

export interface ApplicationDoc {
  applicationId: string;
  studentId: string;
  instituteId: string;
  departmentId: string;
  scholarshipType: ScholarshipType;
  scholarshipName: string;
  schemeReference: string | null;
  requestedAmount: Types.Decimal128;
  approvedAmount: Types.Decimal128 | null;
  academicYear: string | null;
  priority: Priority;
  eligibilityScore: number;
  documentCompletenessScore: number;
  studentProfile: { cgpa?: number | null; courseLevel?: CourseLevel | null };
  bankAccount: { accountNumber?: string | null; routingCode?: string | null };
  status: ApplicationStatus;
  timestamps: {
    submittedAt: Date | null;
    reviewStartedAt: Date | null;
    reviewCompletedAt: Date | null;
    approvedAt: Date | null;
    rejectedAt: Date | null;
    onHoldAt: Date | null;
    disbursedAt: Date | null;
    completedAt: Date | null;
  };
  decisions: {
    institute: StageDecisionDoc;
    department: StageDecisionDoc;
    financeForward: FinanceForwardDoc;
  };
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const stageDecisionSchema = new Schema<StageDecisionDoc>(
  {
    decided: { type: Boolean, required: true, default: false },
    outcome: { type: String, enum: ["approved", "rejected"], default: null },
    actorId: { type: String, default: null },
    remarks: { type: String, default: null },
    amount: { type: Schema.Types.Decimal128, default: null },
    decidedAt: { type: Date, default: null },
  },
  { _id: false },
);

const financeForwardSchema = new Schema<FinanceForwardDoc>(
  {
    forwarded: { type: Boolean, required: true, default: false },
    actorId: { type: String, default: null },
    remarks: { type: String, default: null },
    priority: { type: String, enum: priorities, default: null },
    batchId: { type: String, default: null },
    amount: { type: Schema.Types.Decimal128, default: null },
    forwardedAt: { type: Date, default: null },
  },
  { _id: false },
);

const applicationSchema = new Schema<ApplicationDoc>(
  {
    applicationId: { type: String, required: true, unique: true },
    studentId: { type: String, required: true, index: true },
    instituteId: { type: String, required: true, index: true },
    departmentId: { type: String, required: true, index: true },
    scholarshipType: { type: String, enum: scholarshipTypes, required: true },
    scholarshipName: { type: String, required: true },
    schemeReference: { type: String, default: null },
    requestedAmount: { type: Schema.Types.Decimal128, required: true },
    approvedAmount: { type: Schema.Types.Decimal128, default: null },
    academicYear: { type: String, default: null },
    priority: { type: String, enum: priorities, default: "medium" },
    eligibilityScore: { type: Number, min: 0, max: 100, default: 0 },
    documentCompletenessScore: { type: Number, min: 0, max: 100, default: 0 },
    studentProfile: {
      type: new Schema(
        {
          cgpa: { type: Number, min: 0, max: 10 },
          courseLevel: { type: String, enum: courseLevels },
        },
        { _id: false },
      ),
      default: {},
    },
    bankAccount: { type: bankAccountSchema, default: {} },
    status: { type: String, enum: applicationStatuses, required: true, index: true },
    timestamps: {
      submittedAt: { type: Date, default: null },
      reviewStartedAt: { type: Date, default: null },
      reviewCompletedAt: { type: Date, default: null },
      approvedAt: { type: Date, default: null },
      rejectedAt: { type: Date, default: null },
      onHoldAt: { type: Date, default: null },
      disbursedAt: { type: Date, default: null },
      completedAt: { type: Date, default: null },
    },
    decisions: {
      institute: { type: stageDecisionSchema, required: true },
      department: { type: stageDecisionSchema, required: true },
      financeForward: { type: financeForwardSchema, required: true },
    },
    version: { type: Number, required: true },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { ...engineOwned, collection: "applications" },
);
applicationSchema.index({ status: 1, "decisions.department.decided": 1 });
applicationSchema.index({ status: 1, "decisions.financeForward.forwarded": 1 });

export const ApplicationModel =
  (mongoose.models.Application as mongoose.Model<ApplicationDoc> | undefined) ??
  mongoose.model<ApplicationDoc>("Application", applicationSchema);
