import { EventEmitter } from "node:events";
import type { EngineContext, EngineSettings } from "../context.js";
import type { ApplicationRecord } from "../db/records.js";
import type { TransferGateway } from "../services/transfer-gateway.js";
import type { AuthUser, LoggerLike } from "../types.js";
import { createMemoryStores } from "./memory-store.js";
import { ScriptedTransferGateway } from "./gateways.js";

export const FIXED_NOW = new Date("2025-03-10T09:00:00.000Z");
const DAY_MS = 24 * 60 * 60 * 1000;

export const INSTITUTE_ID = "INST-001";
export const DEPARTMENT_ID = "DEPT-CS";
export const STUDENT_ID = "STU-001";

export const users = {
  admin: { userId: "u-admin", role: "admin" },
  student: { userId: "u-student", role: "student", studentId: STUDENT_ID },
  otherStudent: { userId: "u-student-2", role: "student", studentId: "STU-999" },
  instituteAdmin: { userId: "u-inst", role: "institute_admin", instituteId: INSTITUTE_ID },
  otherInstituteAdmin: { userId: "u-inst-2", role: "institute_admin", instituteId: "INST-999" },
  departmentAdmin: { userId: "u-dept", role: "department_admin", departmentId: DEPARTMENT_ID },
  otherDepartmentAdmin: { userId: "u-dept-2", role: "department_admin", departmentId: "DEPT-999" },
  financeAdmin: { userId: "u-fin", role: "finance_admin" },
} satisfies Record<string, AuthUser>;

export interface LogLine {
  level: "info" | "warn" | "error";
  obj: Record<string, unknown>;
  msg: string;
}

/** Logger that keeps what it is given so tests can assert on it. */
export function recordingLogger(): LoggerLike & { lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    lines,
    info: (obj, msg) => lines.push({ level: "info", obj, msg }),
    warn: (obj, msg) => lines.push({ level: "warn", obj, msg }),
    error: (obj, msg) => lines.push({ level: "error", obj, msg }),
  };
}

interface ContextOverrides {
  gateway?: TransferGateway;
  settings?: Partial<EngineSettings>;
}

export function makeContext(overrides: ContextOverrides = {}) {
  const stores = createMemoryStores();
  const log = recordingLogger();
  const gateway = overrides.gateway ?? new ScriptedTransferGateway();
  let clock = FIXED_NOW.getTime();

  const ctx = {
    stores,
    gateway,
    events: new EventEmitter(),
    log,
    now: () => new Date(clock),
    settings: { slaDays: 30, enforceAmountCeiling: true, ...overrides.settings },
  } satisfies EngineContext;

  return {
    ctx,
    stores,
    log,
    advance(days: number) {
      clock += days * DAY_MS;
    },
  };
}

let sequence = 0;

export function makeApplication(overrides: Partial<ApplicationRecord> = {}): ApplicationRecord {
  sequence += 1;
  const submittedAt = new Date(FIXED_NOW.getTime() - 2 * DAY_MS);
  return {
    applicationId: `APPTEST${String(sequence).padStart(4, "0")}`,
    studentId: STUDENT_ID,
    instituteId: INSTITUTE_ID,
    departmentId: DEPARTMENT_ID,
    scholarshipType: "merit",
    scholarshipName: "State Merit Scholarship",
    schemeReference: null,
    requestedAmount: 50000,
    approvedAmount: null,
    academicYear: "2024-25",
    priority: "medium",
    eligibilityScore: 80,
    documentCompletenessScore: 100,
    studentProfile: { cgpa: 8.4, courseLevel: "undergraduate" },
    bankAccount: { accountNumber: "123456789012", routingCode: "ABCD0123456" },
    status: "submitted",
    timestamps: {
      submittedAt,
      reviewStartedAt: null,
      reviewCompletedAt: null,
      approvedAt: null,
      rejectedAt: null,
      onHoldAt: null,
      disbursedAt: null,
      completedAt: null,
    },
    decisions: {
      institute: { decided: false },
      department: { decided: false },
      financeForward: { forwarded: false },
    },
    version: 1,
    createdAt: submittedAt,
    updatedAt: submittedAt,
    ...overrides,
  };
}

/** Application the institute approved at `amount` (requested amount by default). */
export function instituteApproved(overrides: Partial<ApplicationRecord> = {}): ApplicationRecord {
  const base = makeApplication(overrides);
  const amount = overrides.approvedAmount ?? base.requestedAmount;
  return {
    ...base,
    status: amount < base.requestedAmount ? "partially_approved" : "approved",
    approvedAmount: amount,
    timestamps: { ...base.timestamps, approvedAt: FIXED_NOW, reviewCompletedAt: FIXED_NOW },
    decisions: {
      ...base.decisions,
      institute: {
        decided: true,
        outcome: "approved",
        actorId: users.instituteAdmin.userId,
        remarks: "Eligible",
        amount,
        decidedAt: FIXED_NOW,
      },
    },
  };
}

export function departmentApproved(overrides: Partial<ApplicationRecord> = {}): ApplicationRecord {
  const base = instituteApproved(overrides);
  return {
    ...base,
    decisions: {
      ...base.decisions,
      department: {
        decided: true,
        outcome: "approved",
        actorId: users.departmentAdmin.userId,
        remarks: "Recommended",
        amount: base.approvedAmount,
        decidedAt: FIXED_NOW,
      },
    },
  };
}

/** Approved by both stages and forwarded: ready for a disbursement. */
export function forwardedToFinance(overrides: Partial<ApplicationRecord> = {}): ApplicationRecord {
  const base = departmentApproved(overrides);
  return {
    ...base,
    decisions: {
      ...base.decisions,
      financeForward: {
        forwarded: true,
        actorId: users.departmentAdmin.userId,
        remarks: "",
        priority: "medium",
        batchId: "FWDTEST",
        amount: base.approvedAmount ?? base.requestedAmount,
        forwardedAt: FIXED_NOW,
      },
    },
  };
}

export async function seed(ctx: EngineContext, application: ApplicationRecord): Promise<ApplicationRecord> {
  await ctx.stores.applications.insertApplication(application, []);
  return application;
}
