import type { EngineContext } from "../../../context.js";
import type { ApplicationRecord, DecisionLogDraft } from "../../../db/records.js";
import type { UnitOfWork } from "../../../db/store.js";
import { emitEngineEvent } from "../../../services/event-bus.js";
import type { AuthUser } from "../../../types.js";
import { decisionEntry } from "../../../utils/audit.js";
import { runBatch, type BatchResult } from "../../../utils/batch.js";
import {
  instituteReviewableStatuses,
  type ApplicationStatus,
  type DecisionAction,
  type InstituteReviewAction,
} from "../../../utils/constants.js";
import { AlreadyProcessedError, InvalidTransitionError, ValidationError } from "../../../utils/errors.js";
import { newReviewBatchId } from "../../../utils/ids.js";
import { compareAmounts, isCentPrecise } from "../../../utils/money.js";
import { assertApplicationScope } from "../../../utils/scope.js";
import { findTransitionPath } from "../../../utils/state-machine.js";
import { statusIn, transitionApplication, view } from "../../applications/services/applications.service.js";
import { moveApplication, reviseApplication, type ApplicationView } from "../../applications/services/lifecycle.js";
import type {
  BulkReviewPayload,
  InstituteTransitionPayload,
  ReviewApplicationPayload,
} from "../schemas/institute.schemas.js";

// Statuses the reviewer may pass through on the way to its target
const reviewVia: readonly ApplicationStatus[] = ["under_review", "document_verification", "eligibility_check"];

interface ReviewInput {
  remarks: string;
  approvedAmount?: number;
}

interface ReviewOutcome {
  application: ApplicationRecord;
  action: InstituteReviewAction;
}

const fixedTargets: Record<Exclude<InstituteReviewAction, "approve">, ApplicationStatus> = {
  reject: "rejected",
  request_documents: "document_verification",
  hold: "on_hold",
};

function hopAction(fromStatus: ApplicationStatus, toStatus: ApplicationStatus): DecisionAction {
  switch (toStatus) {
    case "under_review":
      return fromStatus === "submitted" ? "start_review" : "resume_review";
    case "document_verification":
      return "request_documents";
    case "eligibility_check":
      return "start_eligibility_check";
    case "on_hold":
      return "hold";
    case "approved":
      return "institute_approve";
    case "partially_approved":
      return "institute_partially_approve";
    case "rejected":
      return "institute_reject";
    default:
      return "transition";
  }
}

function resolveApprovedAmount(ctx: EngineContext, application: ApplicationRecord, requested?: number): number {
  const amount = requested ?? application.requestedAmount;
  if (!(amount > 0) || !isCentPrecise(amount)) {
    throw new ValidationError("Approved amount must be a positive amount in whole cents", { amount });
  }
  if (ctx.settings.enforceAmountCeiling && compareAmounts(amount, application.requestedAmount) > 0) {
    throw new ValidationError("Approved amount exceeds the requested amount", {
      approvedAmount: amount,
      requestedAmount: application.requestedAmount,
    });
  }
  return amount;
}

function reviewUnit(
  ctx: EngineContext,
  actor: AuthUser,
  action: InstituteReviewAction,
  input: ReviewInput,
): UnitOfWork<ReviewOutcome> {
  return (state) => {
    const current = state.application;
    assertApplicationScope(actor, current);

    if (action !== "approve" && input.remarks.length === 0) {
      throw new ValidationError(`Remarks are required to ${action.replace("_", " ")}`);
    }

    let approvedAmount: number | null = null;
    let target: ApplicationStatus;
    if (action === "approve") {
      approvedAmount = resolveApprovedAmount(ctx, current, input.approvedAmount);
      target = compareAmounts(approvedAmount, current.requestedAmount) < 0 ? "partially_approved" : "approved";
    } else {
      target = fixedTargets[action];
    }

    if (!statusIn(current.status, instituteReviewableStatuses)) {
      if (current.decisions.institute.decided) {
        throw new AlreadyProcessedError("Institute decision already recorded", {
          applicationId: current.applicationId,
          outcome: current.decisions.institute.outcome,
        });
      }
      throw new InvalidTransitionError("application", current.status, target);
    }

    const path = findTransitionPath(current.status, target, reviewVia);
    if (!path) throw new InvalidTransitionError("application", current.status, target);

    const now = ctx.now();
    const draft = reviseApplication(current, now);
    const logEntries: DecisionLogDraft[] = [];
    for (const hop of path) {
      const move = moveApplication(draft, hop, now);
      const isTarget = hop === target;
      logEntries.push(
        decisionEntry(
          actor,
          {
            stage: "institute",
            action: hopAction(move.fromStatus, hop),
            remarks: input.remarks,
            amount: isTarget ? approvedAmount : null,
            ...move,
          },
          now,
        ),
      );
    }

    if (approvedAmount !== null) {
      draft.approvedAmount = approvedAmount;
      draft.decisions.institute = {
        decided: true,
        outcome: "approved",
        actorId: actor.userId,
        remarks: input.remarks,
        amount: approvedAmount,
        decidedAt: now,
      };
    } else if (action === "reject") {
      draft.decisions.institute = {
        decided: true,
        outcome: "rejected",
        actorId: actor.userId,
        remarks: input.remarks,
        amount: null,
        decidedAt: now,
      };
    }

    return { changes: { application: draft, logEntries }, result: { application: draft, action } };
  };
}

async function runReview(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  action: InstituteReviewAction,
  input: ReviewInput,
): Promise<ApplicationView> {
  const { application } = await ctx.stores.applications.mutate(
    applicationId,
    reviewUnit(ctx, actor, action, input),
  );

  ctx.log.info(
    { applicationId, actorId: actor.userId, action, status: application.status },
    "Institute review recorded",
  );

  if (action === "approve") {
    emitEngineEvent(ctx.events, ctx.log, "application.approved", {
      applicationId,
      stage: "institute",
      actorId: actor.userId,
      amount: application.approvedAmount,
    });
  } else if (action === "reject") {
    emitEngineEvent(ctx.events, ctx.log, "application.rejected", {
      applicationId,
      stage: "institute",
      actorId: actor.userId,
    });
  }

  return view(ctx, application);
}

export function approveApplication(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  remarks: string,
  approvedAmount?: number,
) {
  return runReview(ctx, actor, applicationId, "approve", { remarks, approvedAmount });
}

export function rejectApplication(ctx: EngineContext, actor: AuthUser, applicationId: string, remarks: string) {
  return runReview(ctx, actor, applicationId, "reject", { remarks });
}

export function requestDocuments(ctx: EngineContext, actor: AuthUser, applicationId: string, remarks: string) {
  return runReview(ctx, actor, applicationId, "request_documents", { remarks });
}

export function holdApplication(ctx: EngineContext, actor: AuthUser, applicationId: string, remarks: string) {
  return runReview(ctx, actor, applicationId, "hold", { remarks });
}

export async function reviewApplication(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  payload: ReviewApplicationPayload,
): Promise<ApplicationView> {
  if (payload.action !== "approve" && payload.approvedAmount !== undefined) {
    throw new ValidationError("approvedAmount only applies to approve");
  }

  switch (payload.action) {
    case "approve":
      return approveApplication(ctx, actor, applicationId, payload.remarks, payload.approvedAmount);
    case "reject":
      return rejectApplication(ctx, actor, applicationId, payload.remarks);
    case "request_documents":
      return requestDocuments(ctx, actor, applicationId, payload.remarks);
    case "hold":
      return holdApplication(ctx, actor, applicationId, payload.remarks);
  }
}

export async function bulkReview(
  ctx: EngineContext,
  actor: AuthUser,
  payload: BulkReviewPayload,
): Promise<BatchResult<{ status: ApplicationStatus }>> {
  return runBatch({
    batchId: newReviewBatchId(ctx.now()),
    ids: payload.applicationIds,
    operation: `institute.${payload.action}`,
    log: ctx.log,
    work: async (applicationId) => {
      const application = await runReview(ctx, actor, applicationId, payload.action, {
        remarks: payload.remarks,
      });
      return { status: application.status };
    },
  });
}

export function instituteTransition(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  payload: InstituteTransitionPayload,
): Promise<ApplicationView> {
  return transitionApplication(ctx, actor, applicationId, payload, "institute");
}
