import type {
  ApplicationStatus,
  CourseLevel,
  DecisionAction,
  DisbursementMethod,
  DisbursementStatus,
  Priority,
  Role,
  ScholarshipType,
  Stage,
} from "../utils/constants.js";

export interface BankAccount {
  accountNumber?: string;
  routingCode?: string;
}

export interface StudentProfile {
  cgpa?: number;
  courseLevel?: CourseLevel;
}

export type StageDecision =
  | { decided: false }
  | {
      decided: true;
      outcome: "approved" | "rejected";
      actorId: string;
      remarks: string;
      amount: number | null;
      decidedAt: Date;
    };

export type FinanceForward =
  | { forwarded: false }
  | {
      forwarded: true;
      actorId: string;
      remarks: string;
      priority: Priority;
      batchId: string;
      amount: number;
      forwardedAt: Date;
    };

export interface StageDecisions {
  institute: StageDecision;
  department: StageDecision;
  financeForward: FinanceForward;
}

export interface ApplicationTimestamps {
  submittedAt: Date | null;
  reviewStartedAt: Date | null;
  reviewCompletedAt: Date | null;
  approvedAt: Date | null;
  rejectedAt: Date | null;
  onHoldAt: Date | null;
  disbursedAt: Date | null;
  completedAt: Date | null;
}

export interface ApplicationRecord {
  applicationId: string;
  studentId: string;
  instituteId: string;
  departmentId: string;
  scholarshipType: ScholarshipType;
  scholarshipName: string;
  schemeReference: string | null;
  requestedAmount: number;
  approvedAmount: number | null;
  academicYear: string | null;
  priority: Priority;
  eligibilityScore: number;
  documentCompletenessScore: number;
  studentProfile: StudentProfile;
  bankAccount: BankAccount;
  status: ApplicationStatus;
  timestamps: ApplicationTimestamps;
  decisions: StageDecisions;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface DecisionLogDraft {
  stage: Stage;
  action: DecisionAction;
  fromStatus?: ApplicationStatus;
  toStatus?: ApplicationStatus;
  actorId: string;
  actorRole: Role;
  remarks: string;
  amount: number | null;
  metadata?: Record<string, string | number | boolean | null>;
  recordedAt: Date;
}

export interface DecisionLogEntry extends DecisionLogDraft {
  entryId: string;
  applicationId: string;
  sequence: number;
}

export interface DisbursementRecord {
  disbursementId: string;
  applicationId: string;
  amount: number;
  method: DisbursementMethod;
  status: DisbursementStatus;
  bankAccount: BankAccount;
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
