import type { EngineContext } from "../../../context.js";
import type { ApplicationRecord } from "../../../db/records.js";
import type { UnitOfWork } from "../../../db/store.js";
import { emitEngineEvent } from "../../../services/event-bus.js";
import type { AuthUser } from "../../../types.js";
import { decisionEntry } from "../../../utils/audit.js";
import { runBatch, type BatchResult } from "../../../utils/batch.js";
import { instituteApprovedStatuses, type Priority } from "../../../utils/constants.js";
import { AlreadyProcessedError, NotEligibleError, ValidationError } from "../../../utils/errors.js";
import { newForwardBatchId } from "../../../utils/ids.js";
import { compareAmounts, isCentPrecise } from "../../../utils/money.js";
import { queuePage, toPageRequest, type QueuePage } from "../../../utils/queue.js";
import { applicationListScope, assertApplicationScope } from "../../../utils/scope.js";
import { statusIn, view } from "../../applications/services/applications.service.js";
import { moveApplication, reviseApplication, type ApplicationView } from "../../applications/services/lifecycle.js";
import type {
  DepartmentQueueQuery,
  DepartmentReviewPayload,
  ForwardToFinancePayload,
} from "../schemas/department.schemas.js";

/** Scope, then "already decided", then eligibility. */
function assertDepartmentCanDecide(actor: AuthUser, application: ApplicationRecord) {
  assertApplicationScope(actor, application);

  const { department, institute } = application.decisions;
  if (department.decided) {
    throw new AlreadyProcessedError("Department decision already recorded", {
      applicationId: application.applicationId,
      outcome: department.outcome,
    });
  }

  const instituteApproved = institute.decided && institute.outcome === "approved";
  if (!statusIn(application.status, instituteApprovedStatuses) || !instituteApproved) {
    throw new NotEligibleError("Application is not awaiting a department decision", {
      applicationId: application.applicationId,
      status: application.status,
    });
  }
}

function approveUnit(
  ctx: EngineContext,
  actor: AuthUser,
  remarks: string,
  finalAmount?: number,
): UnitOfWork<ApplicationRecord> {
  return (state) => {
    const current = state.application;
    assertDepartmentCanDecide(actor, current);

    if (finalAmount !== undefined) {
      if (!(finalAmount > 0) || !isCentPrecise(finalAmount)) {
        throw new ValidationError("Final amount must be a positive amount in whole cents", { finalAmount });
      }
      if (ctx.settings.enforceAmountCeiling && compareAmounts(finalAmount, current.requestedAmount) > 0) {
        throw new ValidationError("Final amount exceeds the requested amount", {
          finalAmount,
          requestedAmount: current.requestedAmount,
        });
      }
    }

    const now = ctx.now();
    const draft = reviseApplication(current, now);
    const previousAmount = draft.approvedAmount;
    if (finalAmount !== undefined) draft.approvedAmount = finalAmount;

    draft.decisions.department = {
      decided: true,
      outcome: "approved",
      actorId: actor.userId,
      remarks,
      amount: draft.approvedAmount,
      decidedAt: now,
    };

    const entry = decisionEntry(
      actor,
      {
        stage: "department",
        action: "dept_approve",
        remarks,
        amount: draft.approvedAmount,
        metadata: finalAmount !== undefined ? { previousAmount } : undefined,
      },
      now,
    );
    return { changes: { application: draft, logEntries: [entry] }, result: draft };
  };
}

function rejectUnit(ctx: EngineContext, actor: AuthUser, remarks: string): UnitOfWork<ApplicationRecord> {
  return (state) => {
    assertDepartmentCanDecide(actor, state.application);
    if (remarks.length === 0) throw new ValidationError("Remarks are required to reject");

    const now = ctx.now();
    const draft = reviseApplication(state.application, now);
    const move = moveApplication(draft, "rejected", now, { departmentRejection: true });
    draft.decisions.department = {
      decided: true,
      outcome: "rejected",
      actorId: actor.userId,
      remarks,
      amount: null,
      decidedAt: now,
    };

    const entry = decisionEntry(actor, { stage: "department", action: "dept_reject", remarks, ...move }, now);
    return { changes: { application: draft, logEntries: [entry] }, result: draft };
  };
}

export async function departmentApprove(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  remarks: string,
  finalAmount?: number,
): Promise<ApplicationView> {
  const application = await ctx.stores.applications.mutate(
    applicationId,
    approveUnit(ctx, actor, remarks, finalAmount),
  );

  ctx.log.info(
    { applicationId, actorId: actor.userId, approvedAmount: application.approvedAmount },
    "Department approved application",
  );
  emitEngineEvent(ctx.events, ctx.log, "application.approved", {
    applicationId,
    stage: "department",
    actorId: actor.userId,
    amount: application.approvedAmount,
  });
  return view(ctx, application);
}

export async function departmentReject(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  remarks: string,
): Promise<ApplicationView> {
  const application = await ctx.stores.applications.mutate(applicationId, rejectUnit(ctx, actor, remarks));

  ctx.log.info({ applicationId, actorId: actor.userId }, "Department rejected application");
  emitEngineEvent(ctx.events, ctx.log, "application.rejected", {
    applicationId,
    stage: "department",
    actorId: actor.userId,
  });
  return view(ctx, application);
}

export async function departmentReview(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  payload: DepartmentReviewPayload,
): Promise<ApplicationView> {
  if (payload.action === "dept_reject") {
    if (payload.finalAmount !== undefined) throw new ValidationError("finalAmount only applies to dept_approve");
    return departmentReject(ctx, actor, applicationId, payload.remarks);
  }
  return departmentApprove(ctx, actor, applicationId, payload.remarks, payload.finalAmount);
}

interface ForwardOutcome {
  batchId: string;
  amount: number;
  priority: Priority;
}

function forwardUnit(
  ctx: EngineContext,
  actor: AuthUser,
  batchId: string,
  payload: ForwardToFinancePayload,
): UnitOfWork<ForwardOutcome> {
  return (state) => {
    const current = state.application;
    assertApplicationScope(actor, current);

    const { department, financeForward } = current.decisions;
    if (!department.decided || department.outcome !== "approved") {
      throw new NotEligibleError("Application has no department approval", {
        applicationId: current.applicationId,
      });
    }
    if (financeForward.forwarded) {
      throw new AlreadyProcessedError("Application already forwarded to finance", {
        applicationId: current.applicationId,
        batchId: financeForward.batchId,
      });
    }
    if (!statusIn(current.status, instituteApprovedStatuses)) {
      throw new NotEligibleError("Application is no longer approved", {
        applicationId: current.applicationId,
        status: current.status,
      });
    }

    const now = ctx.now();
    const draft = reviseApplication(current, now);
    const amount = draft.approvedAmount ?? draft.requestedAmount;
    draft.priority = payload.priority;
    draft.decisions.financeForward = {
      forwarded: true,
      actorId: actor.userId,
      remarks: payload.remarks,
      priority: payload.priority,
      batchId,
      amount,
      forwardedAt: now,
    };

    const entry = decisionEntry(
      actor,
      {
        stage: "department",
        action: "forward_to_finance",
        remarks: payload.remarks,
        amount,
        metadata: { batchId, priority: payload.priority },
      },
      now,
    );
    return {
      changes: { application: draft, logEntries: [entry] },
      result: { batchId, amount, priority: payload.priority },
    };
  };
}

export async function forwardToFinance(
  ctx: EngineContext,
  actor: AuthUser,
  payload: ForwardToFinancePayload,
): Promise<BatchResult<ForwardOutcome>> {
  const batchId = newForwardBatchId(ctx.now());
  return runBatch({
    batchId,
    ids: payload.applicationIds,
    operation: "department.forward_to_finance",
    log: ctx.log,
    work: async (applicationId) => {
      const outcome = await ctx.stores.applications.mutate(
        applicationId,
        forwardUnit(ctx, actor, batchId, payload),
      );
      ctx.log.info({ applicationId, batchId, amount: outcome.amount }, "Application forwarded to finance");
      emitEngineEvent(ctx.events, ctx.log, "application.forwarded", {
        applicationId,
        batchId,
        amount: outcome.amount,
      });
      return outcome;
    },
  });
}

export async function listDepartmentQueue(
  ctx: EngineContext,
  actor: AuthUser,
  query: DepartmentQueueQuery,
): Promise<QueuePage<ApplicationView>> {
  const { rows, total } = await ctx.stores.applications.listApplications(
    {
      statuses: [...instituteApprovedStatuses],
      instituteApproved: true,
      departmentDecided: false,
      priority: query.priority,
      ...applicationListScope(actor),
    },
    toPageRequest(query),
  );
  return queuePage(
    rows.map((row) => view(ctx, row)),
    total,
    query,
  );
}
