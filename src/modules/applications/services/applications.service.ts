import type { EngineContext } from "../../../context.js";
import type {
  ApplicationRecord,
  BankAccount,
  DecisionLogDraft,
  DecisionLogEntry,
  DisbursementRecord,
  StageDecisions,
} from "../../../db/records.js";
import type { ApplicationStatus, Stage } from "../../../utils/constants.js";
import type { AuthUser } from "../../../types.js";
import { decisionEntry } from "../../../utils/audit.js";
import { HttpError, NotFoundError, ValidationError } from "../../../utils/errors.js";
import { newApplicationId } from "../../../utils/ids.js";
import { assertApplicationScope } from "../../../utils/scope.js";
import type {
  CompleteApplicationPayload,
  CreateApplicationPayload,
  SubmitApplicationPayload,
  TransitionApplicationPayload,
} from "../schemas/applications.schemas.js";
import { replayDecisionState } from "./decision-log.service.js";
import {
  moveApplication,
  reviseApplication,
  stageForRole,
  toApplicationView,
  type ApplicationView,
} from "./lifecycle.js";

export interface ApplicationDetails {
  application: ApplicationView;
  disbursements: DisbursementRecord[];
}

export interface DecisionLogView {
  applicationId: string;
  entries: DecisionLogEntry[];
  decisions: StageDecisions;
}

function resolveStudentId(actor: AuthUser, requested?: string): string {
  if (actor.role !== "student") {
    if (!requested) throw new ValidationError("studentId is required when filing for a student");
    return requested;
  }
  if (!actor.studentId) throw new HttpError(403, "Student profile required");
  if (requested && requested !== actor.studentId) {
    throw new HttpError(403, "Students may only file their own applications");
  }
  return actor.studentId;
}

function pickBankAccount(input: CreateApplicationPayload["bankAccount"]): BankAccount {
  const account: BankAccount = {};
  if (input.accountNumber) account.accountNumber = input.accountNumber;
  if (input.routingCode) account.routingCode = input.routingCode;
  return account;
}

export function view(ctx: EngineContext, application: ApplicationRecord): ApplicationView {
  return toApplicationView(application, ctx.now(), ctx.settings.slaDays);
}

export async function createApplication(
  ctx: EngineContext,
  actor: AuthUser,
  payload: CreateApplicationPayload,
): Promise<ApplicationView> {
  const now = ctx.now();
  const application: ApplicationRecord = {
    applicationId: newApplicationId(now),
    studentId: resolveStudentId(actor, payload.studentId),
    instituteId: payload.instituteId,
    departmentId: payload.departmentId,
    scholarshipType: payload.scholarshipType,
    scholarshipName: payload.scholarshipName,
    schemeReference: payload.schemeReference ?? null,
    requestedAmount: payload.requestedAmount,
    approvedAmount: null,
    academicYear: payload.academicYear ?? null,
    priority: payload.priority,
    eligibilityScore: payload.eligibilityScore,
    documentCompletenessScore: payload.documentCompletenessScore,
    studentProfile: { ...payload.studentProfile },
    bankAccount: pickBankAccount(payload.bankAccount),
    status: "draft",
    timestamps: {
      submittedAt: null,
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
    createdAt: now,
    updatedAt: now,
  };
  assertApplicationScope(actor, application);

  const entries: DecisionLogDraft[] = [];
  if (payload.submit) {
    const move = moveApplication(application, "submitted", now);
    entries.push(decisionEntry(actor, { stage: "intake", action: "submit", ...move }, now));
  }

  await ctx.stores.applications.insertApplication(application, entries);
  ctx.log.info(
    { applicationId: application.applicationId, studentId: application.studentId, status: application.status },
    "Application created",
  );
  return view(ctx, application);
}

export async function submitApplication(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  payload: SubmitApplicationPayload,
): Promise<ApplicationView> {
  const application = await ctx.stores.applications.mutate(applicationId, (state) => {
    assertApplicationScope(actor, state.application);
    const now = ctx.now();
    const draft = reviseApplication(state.application, now);
    const move = moveApplication(draft, "submitted", now);
    return {
      changes: {
        application: draft,
        logEntries: [
          decisionEntry(actor, { stage: "intake", action: "submit", remarks: payload.remarks, ...move }, now),
        ],
      },
      result: draft,
    };
  });

  ctx.log.info({ applicationId, actorId: actor.userId }, "Application submitted");
  return view(ctx, application);
}

/**
 * Moves an application along one plain edge of the lifecycle. Guarded edges
 * (department rejection, settlement) are reachable only through their
 * gatekeepers.
 */
export async function transitionApplication(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  payload: TransitionApplicationPayload,
  stage: Stage = stageForRole(actor.role),
): Promise<ApplicationView> {
  const application = await ctx.stores.applications.mutate(applicationId, (state) => {
    assertApplicationScope(actor, state.application);
    const now = ctx.now();
    const draft = reviseApplication(state.application, now);
    const move = moveApplication(draft, payload.targetStatus, now);
    return {
      changes: {
        application: draft,
        logEntries: [decisionEntry(actor, { stage, action: "transition", remarks: payload.remarks, ...move }, now)],
      },
      result: draft,
    };
  });

  ctx.log.info(
    { applicationId, actorId: actor.userId, toStatus: application.status },
    "Application transitioned",
  );
  return view(ctx, application);
}

export async function completeApplication(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  payload: CompleteApplicationPayload,
): Promise<ApplicationView> {
  const application = await ctx.stores.applications.mutate(applicationId, (state) => {
    assertApplicationScope(actor, state.application);
    const now = ctx.now();
    const draft = reviseApplication(state.application, now);
    const move = moveApplication(draft, "completed", now);
    return {
      changes: {
        application: draft,
        logEntries: [
          decisionEntry(
            actor,
            { stage: "finance", action: "complete", remarks: payload.remarks, amount: draft.approvedAmount, ...move },
            now,
          ),
        ],
      },
      result: draft,
    };
  });

  ctx.log.info({ applicationId, actorId: actor.userId }, "Application completed");
  return view(ctx, application);
}

export async function loadScopedApplication(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
): Promise<ApplicationRecord> {
  const application = await ctx.stores.applications.findApplication(applicationId);
  if (!application) throw new NotFoundError("Application", applicationId);
  assertApplicationScope(actor, application);
  return application;
}

export async function getApplication(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
): Promise<ApplicationDetails> {
  const application = await loadScopedApplication(ctx, actor, applicationId);
  const disbursements = await ctx.stores.applications.listDisbursements(applicationId);
  return { application: view(ctx, application), disbursements };
}

export async function getDecisionLog(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
): Promise<DecisionLogView> {
  await loadScopedApplication(ctx, actor, applicationId);
  const entries = await ctx.stores.applications.listDecisionLog(applicationId);
  return { applicationId, entries, decisions: replayDecisionState(entries) };
}

export function statusIn<S extends ApplicationStatus>(
  status: ApplicationStatus,
  allowed: readonly S[],
): status is S {
  return allowed.some((candidate) => candidate === status);
}
