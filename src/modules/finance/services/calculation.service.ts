import type { EngineContext } from "../../../context.js";
import type { ApplicationRecord } from "../../../db/records.js";
import type { UnitOfWork } from "../../../db/store.js";
import type { AuthUser } from "../../../types.js";
import { decisionEntry } from "../../../utils/audit.js";
import { instituteApprovedStatuses } from "../../../utils/constants.js";
import { AlreadyDisbursedError, NotEligibleError, ValidationError } from "../../../utils/errors.js";
import { compareAmounts } from "../../../utils/money.js";
import { queuePage, toPageRequest, type QueuePage } from "../../../utils/queue.js";
import { applicationListScope, assertApplicationScope } from "../../../utils/scope.js";
import { loadScopedApplication, statusIn, view } from "../../applications/services/applications.service.js";
import { reviseApplication, type ApplicationView } from "../../applications/services/lifecycle.js";
import type { CalculateAmountPayload, FinanceQueueQuery } from "../schemas/finance.schemas.js";
import { calculate, type CalculationFactors, type CalculationResult } from "./amount-calculator.js";

export interface CalculationView {
  applicationId: string;
  calculation: CalculationResult;
  applied: boolean;
}

/** Stored application data first, request factors override. */
export function factorsFor(
  application: ApplicationRecord,
  overrides: CalculateAmountPayload["customFactors"],
): CalculationFactors {
  return {
    baseAmount: application.approvedAmount ?? application.requestedAmount,
    cgpa: application.studentProfile.cgpa,
    courseLevel: application.studentProfile.courseLevel,
    scholarshipType: application.scholarshipType,
    ...overrides,
  };
}

function applyUnit(
  ctx: EngineContext,
  actor: AuthUser,
  payload: CalculateAmountPayload,
): UnitOfWork<CalculationResult> {
  return (state) => {
    const current = state.application;
    assertApplicationScope(actor, current);

    // Recomputed inside the unit so the applied amount matches the row written.
    const calculation = calculate(payload.strategy, factorsFor(current, payload.customFactors));

    if (!current.decisions.financeForward.forwarded) {
      throw new NotEligibleError("Application has not been forwarded to finance", {
        applicationId: current.applicationId,
      });
    }
    const active = state.disbursements.find((disbursement) => disbursement.status !== "cancelled");
    if (active) throw new AlreadyDisbursedError(current.applicationId, active.disbursementId);
    if (!statusIn(current.status, instituteApprovedStatuses)) {
      throw new NotEligibleError("Application is not awaiting disbursement", {
        applicationId: current.applicationId,
        status: current.status,
      });
    }
    if (!(calculation.finalAmount > 0)) {
      throw new ValidationError("Calculated amount must be positive to apply", {
        finalAmount: calculation.finalAmount,
      });
    }
    if (ctx.settings.enforceAmountCeiling && compareAmounts(calculation.finalAmount, current.requestedAmount) > 0) {
      throw new ValidationError("Calculated amount exceeds the requested amount", {
        finalAmount: calculation.finalAmount,
        requestedAmount: current.requestedAmount,
      });
    }

    const now = ctx.now();
    const draft = reviseApplication(current, now);
    const previousAmount = draft.approvedAmount;
    draft.approvedAmount = calculation.finalAmount;

    const entry = decisionEntry(
      actor,
      {
        stage: "finance",
        action: "amount_applied",
        amount: calculation.finalAmount,
        metadata: { strategy: payload.strategy, previousAmount },
      },
      now,
    );
    return { changes: { application: draft, logEntries: [entry] }, result: calculation };
  };
}

export async function calculateAmount(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  payload: CalculateAmountPayload,
): Promise<CalculationView> {
  if (!payload.apply) {
    const application = await loadScopedApplication(ctx, actor, applicationId);
    return {
      applicationId,
      calculation: calculate(payload.strategy, factorsFor(application, payload.customFactors)),
      applied: false,
    };
  }

  const calculation = await ctx.stores.applications.mutate(applicationId, applyUnit(ctx, actor, payload));
  ctx.log.info(
    { applicationId, actorId: actor.userId, strategy: payload.strategy, amount: calculation.finalAmount },
    "Calculated amount applied",
  );
  return { applicationId, calculation, applied: true };
}

/** Forwarded applications still waiting for their money. */
export async function listFinanceQueue(
  ctx: EngineContext,
  actor: AuthUser,
  query: FinanceQueueQuery,
): Promise<QueuePage<ApplicationView>> {
  const { rows, total } = await ctx.stores.applications.listApplications(
    { statuses: [...instituteApprovedStatuses], forwarded: true, priority: query.priority, ...applicationListScope(actor) },
    toPageRequest(query),
  );
  return queuePage(
    rows.map((row) => view(ctx, row)),
    total,
    query,
  );
}
