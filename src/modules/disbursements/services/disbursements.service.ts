import type { EngineContext } from "../../../context.js";
import type { ApplicationRecord, DisbursementRecord } from "../../../db/records.js";
import type { ApplicationState, UnitOfWork } from "../../../db/store.js";
import { emitEngineEvent } from "../../../services/event-bus.js";
import type { TransferResult } from "../../../services/transfer-gateway.js";
import type { AuthUser } from "../../../types.js";
import { decisionEntry } from "../../../utils/audit.js";
import { runBatch, type BatchResult } from "../../../utils/batch.js";
import {
  instituteApprovedStatuses,
  type DisbursementMethod,
  type DisbursementStatus,
} from "../../../utils/constants.js";
import {
  AlreadyDisbursedError,
  ConcurrencyConflictError,
  HttpError,
  IncompleteBankDetailsError,
  NotEligibleError,
  NotFoundError,
  TransferFailedError,
  ValidationError,
} from "../../../utils/errors.js";
import { newDisbursementId, newTransferBatchId } from "../../../utils/ids.js";
import { amountToCents, centsToNumber } from "../../../utils/money.js";
import { assertApplicationScope } from "../../../utils/scope.js";
import { assertTransition, type DisbursementTransitionContext } from "../../../utils/state-machine.js";
import { loadScopedApplication, statusIn } from "../../applications/services/applications.service.js";
import { moveApplication, reviseApplication } from "../../applications/services/lifecycle.js";
import type {
  BulkTransferPayload,
  CancelDisbursementPayload,
  CreateDisbursementsPayload,
  ReconcileTransferPayload,
  SettleDisbursementPayload,
  UpdateBankDetailsPayload,
} from "../schemas/disbursements.schemas.js";

export interface CreateDisbursementInput {
  method: DisbursementMethod;
  remarks: string;
  batchId?: string;
}

export interface TransferItem {
  disbursementId: string;
  amount: number;
  status: DisbursementStatus;
  transactionReference: string | null;
}

export type TransferBatchResult = BatchResult<TransferItem> & { totalAmount: number };

function locate(state: ApplicationState, disbursementId: string): DisbursementRecord {
  const disbursement = state.disbursements.find((row) => row.disbursementId === disbursementId);
  if (!disbursement) throw new NotFoundError("Disbursement", disbursementId);
  return disbursement;
}

function reviseDisbursement(disbursement: DisbursementRecord, now: Date): DisbursementRecord {
  return { ...structuredClone(disbursement), version: disbursement.version + 1, updatedAt: now };
}

function moveDisbursement(
  draft: DisbursementRecord,
  toStatus: DisbursementStatus,
  context?: DisbursementTransitionContext,
): { fromStatus: DisbursementStatus; toStatus: DisbursementStatus } {
  const fromStatus = draft.status;
  assertTransition("disbursement", fromStatus, toStatus, context);
  draft.status = toStatus;
  return { fromStatus, toStatus };
}

function missingBankFields(disbursement: DisbursementRecord): string[] {
  const missing: string[] = [];
  if (!disbursement.bankAccount.accountNumber) missing.push("accountNumber");
  if (!disbursement.bankAccount.routingCode) missing.push("routingCode");
  return missing;
}

/** Disbursement ids are global; the unit runs under the owning application. */
async function owningApplicationId(ctx: EngineContext, disbursementId: string): Promise<string> {
  const disbursement = await ctx.stores.applications.findDisbursement(disbursementId);
  if (!disbursement) throw new NotFoundError("Disbursement", disbursementId);
  return disbursement.applicationId;
}

function sumAmounts(items: TransferItem[]): number {
  return centsToNumber(items.reduce((total, item) => total + amountToCents(item.amount), 0n));
}

function toTransferItem(disbursement: DisbursementRecord): TransferItem {
  return {
    disbursementId: disbursement.disbursementId,
    amount: disbursement.amount,
    status: disbursement.status,
    transactionReference: disbursement.transactionReference,
  };
}

function createUnit(
  ctx: EngineContext,
  actor: AuthUser,
  input: CreateDisbursementInput,
): UnitOfWork<DisbursementRecord> {
  return (state) => {
    const current = state.application;
    assertApplicationScope(actor, current);

    const active = state.disbursements.find((row) => row.status !== "cancelled");
    if (active) throw new AlreadyDisbursedError(current.applicationId, active.disbursementId);

    const forward = current.decisions.financeForward;
    if (!forward.forwarded || !statusIn(current.status, instituteApprovedStatuses)) {
      throw new NotEligibleError("Application is not ready for disbursement", {
        applicationId: current.applicationId,
        status: current.status,
        forwarded: forward.forwarded,
      });
    }

    const now = ctx.now();
    const disbursement: DisbursementRecord = {
      disbursementId: newDisbursementId(now),
      applicationId: current.applicationId,
      amount: current.approvedAmount ?? forward.amount,
      method: input.method,
      status: "pending",
      bankAccount: { ...current.bankAccount },
      transactionReference: null,
      failureReason: null,
      batchId: input.batchId ?? null,
      attempts: 0,
      disbursedAt: null,
      remarks: input.remarks ? [input.remarks] : [],
      createdBy: actor.userId,
      version: 1,
      createdAt: now,
      updatedAt: now,
    };

    const entry = decisionEntry(
      actor,
      {
        stage: "finance",
        action: "disbursement_created",
        remarks: input.remarks,
        amount: disbursement.amount,
        metadata: { disbursementId: disbursement.disbursementId, method: input.method },
      },
      now,
    );
    return { changes: { disbursements: [disbursement], logEntries: [entry] }, result: disbursement };
  };
}

export async function createDisbursement(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  input: CreateDisbursementInput,
): Promise<DisbursementRecord> {
  const disbursement = await ctx.stores.applications.mutate(applicationId, createUnit(ctx, actor, input));
  ctx.log.info(
    {
      applicationId,
      disbursementId: disbursement.disbursementId,
      amount: disbursement.amount,
      method: disbursement.method,
    },
    "Disbursement created",
  );
  return disbursement;
}

interface ClaimOptions {
  batchId?: string;
  retry: boolean;
}

function claimUnit(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
  options: ClaimOptions,
): UnitOfWork<DisbursementRecord> {
  return (state) => {
    assertApplicationScope(actor, state.application);
    const current = locate(state, disbursementId);

    if (current.method !== "bank_transfer") {
      throw new ValidationError("Only bank transfers go through the transfer gateway; settle it manually", {
        disbursementId,
        method: current.method,
      });
    }
    if (options.retry && current.status !== "failed") {
      throw new NotEligibleError("Only failed transfers can be retried", { disbursementId, status: current.status });
    }
    assertTransition("disbursement", current.status, "processing");

    const missing = missingBankFields(current);
    if (missing.length > 0) throw new IncompleteBankDetailsError(disbursementId, missing);

    const now = ctx.now();
    const draft = reviseDisbursement(current, now);
    moveDisbursement(draft, "processing");
    draft.attempts += 1;
    draft.failureReason = null;
    if (options.batchId) draft.batchId = options.batchId;

    const metadata: Record<string, string | number> = { disbursementId, attempt: draft.attempts };
    if (draft.batchId) metadata.batchId = draft.batchId;
    const entry = decisionEntry(
      actor,
      { stage: "finance", action: "transfer_started", amount: draft.amount, metadata },
      now,
    );
    return { changes: { disbursements: [draft], logEntries: [entry] }, result: draft };
  };
}

interface SettleNote {
  remarks?: string;
  reconciled?: boolean;
}

function alreadySettled(current: DisbursementRecord, outcome: TransferResult): boolean {
  if (outcome.success) return current.status === "disbursed" && current.transactionReference === outcome.reference;
  return current.status === "failed" && current.failureReason === outcome.reason;
}

function settleUnit(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
  outcome: TransferResult,
  note: SettleNote = {},
): UnitOfWork<DisbursementRecord> {
  return (state) => {
    const current = locate(state, disbursementId);
    // A commit reported as failed may still have landed.
    if (alreadySettled(current, outcome)) return { changes: {}, result: current };

    const now = ctx.now();
    const draft = reviseDisbursement(current, now);
    const metadata: Record<string, string | number | boolean> = {
      disbursementId: draft.disbursementId,
      attempt: draft.attempts,
    };
    if (note.reconciled) metadata.reconciled = true;
    if (note.remarks) draft.remarks.push(note.remarks);

    if (!outcome.success) {
      moveDisbursement(draft, "failed", { hasFailureReason: true });
      draft.failureReason = outcome.reason;
      const entry = decisionEntry(
        actor,
        { stage: "finance", action: "transfer_failed", remarks: outcome.reason, amount: draft.amount, metadata },
        now,
      );
      return { changes: { disbursements: [draft], logEntries: [entry] }, result: draft };
    }

    moveDisbursement(draft, "disbursed", { hasTransactionReference: true });
    draft.transactionReference = outcome.reference;
    draft.disbursedAt = now;

    const application = reviseApplication(state.application, now);
    const move = moveApplication(application, "disbursed", now, { disbursementSettled: true });
    const entry = decisionEntry(
      actor,
      {
        stage: "finance",
        action: "transfer_succeeded",
        remarks: note.remarks,
        amount: draft.amount,
        metadata: { ...metadata, transactionReference: outcome.reference },
        ...move,
      },
      now,
    );
    return { changes: { application, disbursements: [draft], logEntries: [entry] }, result: draft };
  };
}

const SETTLE_ATTEMPTS = 3;

function retryableSettleError(error: unknown): boolean {
  return !(error instanceof HttpError) || error instanceof ConcurrencyConflictError;
}

/**
 * Commits a gateway outcome. Store failures are retried; when every attempt
 * fails the disbursement stays `processing` until `reconcileTransfer`.
 */
async function commitSettlement(
  ctx: EngineContext,
  actor: AuthUser,
  applicationId: string,
  disbursementId: string,
  outcome: TransferResult,
): Promise<DisbursementRecord> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await ctx.stores.applications.mutate(applicationId, settleUnit(ctx, actor, disbursementId, outcome));
    } catch (error) {
      if (!retryableSettleError(error)) throw error;
      if (attempt >= SETTLE_ATTEMPTS) {
        ctx.log.error(
          { err: error, applicationId, disbursementId, outcome },
          "Transfer outcome not recorded; disbursement left processing for reconciliation",
        );
        throw error;
      }
      ctx.log.warn({ err: error, applicationId, disbursementId, attempt }, "Retrying transfer settlement");
    }
  }
}

async function callGateway(ctx: EngineContext, disbursement: DisbursementRecord): Promise<TransferResult> {
  const { accountNumber, routingCode } = disbursement.bankAccount;
  if (!accountNumber || !routingCode) {
    return { success: false, reason: "Bank details changed before the transfer was sent" };
  }
  try {
    return await ctx.gateway.transfer({
      accountNumber,
      routingCode,
      amount: disbursement.amount,
      reference: disbursement.disbursementId,
    });
  } catch (error) {
    ctx.log.error(
      { err: error, disbursementId: disbursement.disbursementId },
      "Transfer gateway call failed",
    );
    const detail = error instanceof Error ? error.message : String(error);
    return { success: false, reason: `Transfer gateway error: ${detail}` };
  }
}

function reportSettlement(ctx: EngineContext, disbursement: DisbursementRecord) {
  if (disbursement.status === "disbursed" && disbursement.transactionReference) {
    ctx.log.info(
      {
        applicationId: disbursement.applicationId,
        disbursementId: disbursement.disbursementId,
        amount: disbursement.amount,
        transactionReference: disbursement.transactionReference,
      },
      "Disbursement completed",
    );
    emitEngineEvent(ctx.events, ctx.log, "disbursement.completed", {
      applicationId: disbursement.applicationId,
      disbursementId: disbursement.disbursementId,
      amount: disbursement.amount,
      transactionReference: disbursement.transactionReference,
    });
    return;
  }

  const reason = disbursement.failureReason ?? "Unknown failure";
  ctx.log.warn(
    { applicationId: disbursement.applicationId, disbursementId: disbursement.disbursementId, reason },
    "Disbursement transfer failed",
  );
  emitEngineEvent(ctx.events, ctx.log, "disbursement.failed", {
    applicationId: disbursement.applicationId,
    disbursementId: disbursement.disbursementId,
    reason,
  });
}

async function runTransfer(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
  options: ClaimOptions,
): Promise<DisbursementRecord> {
  const applicationId = await owningApplicationId(ctx, disbursementId);
  const claimed = await ctx.stores.applications.mutate(
    applicationId,
    claimUnit(ctx, actor, disbursementId, options),
  );

  // The claim is committed; the gateway call holds no lock.
  const outcome = await callGateway(ctx, claimed);
  ctx.log.info(
    outcome.success
      ? { applicationId, disbursementId, attempt: claimed.attempts, transactionReference: outcome.reference }
      : { applicationId, disbursementId, attempt: claimed.attempts, reason: outcome.reason },
    "Transfer gateway responded",
  );
  const settled = await commitSettlement(ctx, actor, applicationId, disbursementId, outcome);
  reportSettlement(ctx, settled);
  return settled;
}

/**
 * Sends a pending (or failed) bank transfer through the gateway. A gateway
 * failure is recorded on the disbursement and returned, not thrown.
 */
export function executeTransfer(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
  batchId?: string,
): Promise<DisbursementRecord> {
  return runTransfer(ctx, actor, disbursementId, { batchId, retry: false });
}

export function retryTransfer(ctx: EngineContext, actor: AuthUser, disbursementId: string) {
  return runTransfer(ctx, actor, disbursementId, { retry: true });
}

function assertTransferred(disbursement: DisbursementRecord): TransferItem {
  if (disbursement.status === "failed") {
    throw new TransferFailedError(disbursement.disbursementId, disbursement.failureReason ?? "Unknown failure");
  }
  return toTransferItem(disbursement);
}

function withTotal(result: BatchResult<TransferItem>): TransferBatchResult {
  const transferred = result.results.flatMap((item) =>
    item.data && item.data.status === "disbursed" ? [item.data] : [],
  );
  return { ...result, totalAmount: sumAmounts(transferred) };
}

export async function bulkTransfer(
  ctx: EngineContext,
  actor: AuthUser,
  payload: BulkTransferPayload,
): Promise<TransferBatchResult> {
  const batchId = newTransferBatchId(ctx.now());
  const result = await runBatch({
    batchId,
    ids: payload.disbursementIds,
    operation: "finance.bulk_transfer",
    log: ctx.log,
    work: async (disbursementId) => assertTransferred(await executeTransfer(ctx, actor, disbursementId, batchId)),
  });
  return withTotal(result);
}

export async function createAndTransferDisbursement(
  ctx: EngineContext,
  actor: AuthUser,
  payload: CreateDisbursementsPayload,
): Promise<TransferBatchResult> {
  const applicationIds = payload.applicationIds ?? (payload.applicationId ? [payload.applicationId] : []);
  const batchId = newTransferBatchId(ctx.now());
  const result = await runBatch({
    batchId,
    ids: applicationIds,
    operation: "finance.disburse",
    log: ctx.log,
    work: async (applicationId) => {
      const created = await createDisbursement(ctx, actor, applicationId, {
        method: payload.method,
        remarks: payload.remarks,
        batchId,
      });
      if (created.method !== "bank_transfer") return toTransferItem(created);
      return assertTransferred(await executeTransfer(ctx, actor, created.disbursementId, batchId));
    },
  });
  return withTotal(result);
}

export async function cancelDisbursement(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
  payload: CancelDisbursementPayload,
): Promise<DisbursementRecord> {
  const applicationId = await owningApplicationId(ctx, disbursementId);
  const disbursement = await ctx.stores.applications.mutate(applicationId, (state) => {
    assertApplicationScope(actor, state.application);
    const now = ctx.now();
    const draft = reviseDisbursement(locate(state, disbursementId), now);
    moveDisbursement(draft, "cancelled");
    draft.remarks.push(payload.remarks);

    const entry = decisionEntry(
      actor,
      {
        stage: "finance",
        action: "disbursement_cancelled",
        remarks: payload.remarks,
        amount: draft.amount,
        metadata: { disbursementId },
      },
      now,
    );
    return { changes: { disbursements: [draft], logEntries: [entry] }, result: draft };
  });

  ctx.log.info({ applicationId, disbursementId, actorId: actor.userId }, "Disbursement cancelled");
  return disbursement;
}

/** Corrects bank details on a disbursement that has not been paid, and on its application. */
export async function updateBankDetails(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
  payload: UpdateBankDetailsPayload,
): Promise<DisbursementRecord> {
  const applicationId = await owningApplicationId(ctx, disbursementId);
  const disbursement = await ctx.stores.applications.mutate(applicationId, (state) => {
    assertApplicationScope(actor, state.application);
    const current = locate(state, disbursementId);
    if (current.status !== "pending" && current.status !== "failed") {
      throw new NotEligibleError("Bank details can only change before a transfer is in flight or paid", {
        disbursementId,
        status: current.status,
      });
    }

    const now = ctx.now();
    const draft = reviseDisbursement(current, now);
    const application: ApplicationRecord = reviseApplication(state.application, now);
    const fields: string[] = [];
    if (payload.accountNumber !== undefined) {
      draft.bankAccount.accountNumber = payload.accountNumber;
      application.bankAccount.accountNumber = payload.accountNumber;
      fields.push("accountNumber");
    }
    if (payload.routingCode !== undefined) {
      draft.bankAccount.routingCode = payload.routingCode;
      application.bankAccount.routingCode = payload.routingCode;
      fields.push("routingCode");
    }

    const entry = decisionEntry(
      actor,
      {
        stage: "finance",
        action: "bank_details_updated",
        metadata: { disbursementId, fields: fields.join(",") },
      },
      now,
    );
    return { changes: { application, disbursements: [draft], logEntries: [entry] }, result: draft };
  });

  ctx.log.info({ applicationId, disbursementId, actorId: actor.userId }, "Bank details updated");
  return disbursement;
}

/**
 * Finishes a bank transfer stuck in `processing` with the outcome the bank
 * reports, e.g. after its settlement could not be committed.
 */
export async function reconcileTransfer(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
  payload: ReconcileTransferPayload,
): Promise<DisbursementRecord> {
  const outcome: TransferResult =
    payload.outcome === "succeeded"
      ? { success: true, reference: payload.transactionReference }
      : { success: false, reason: payload.reason };
  const applicationId = await owningApplicationId(ctx, disbursementId);
  const disbursement = await ctx.stores.applications.mutate(applicationId, (state) => {
    assertApplicationScope(actor, state.application);
    const current = locate(state, disbursementId);
    if (current.method !== "bank_transfer" || current.status !== "processing") {
      throw new NotEligibleError("Only bank transfers in processing can be reconciled", {
        disbursementId,
        method: current.method,
        status: current.status,
      });
    }
    return settleUnit(ctx, actor, disbursementId, outcome, { remarks: payload.remarks, reconciled: true })(state);
  });

  ctx.log.info(
    { applicationId, disbursementId, actorId: actor.userId, outcome: payload.outcome },
    "Transfer reconciled",
  );
  reportSettlement(ctx, disbursement);
  return disbursement;
}

/** Records payment made outside the gateway (cheque, cash, fee adjustment). */
export async function settleManually(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
  payload: SettleDisbursementPayload,
): Promise<DisbursementRecord> {
  const applicationId = await owningApplicationId(ctx, disbursementId);
  const disbursement = await ctx.stores.applications.mutate(applicationId, (state) => {
    assertApplicationScope(actor, state.application);
    const current = locate(state, disbursementId);
    if (current.method === "bank_transfer") {
      throw new ValidationError("Bank transfers settle through the transfer gateway", { disbursementId });
    }

    const now = ctx.now();
    const draft = reviseDisbursement(current, now);
    moveDisbursement(draft, "processing");
    moveDisbursement(draft, "disbursed", { hasTransactionReference: true });
    draft.attempts += 1;
    draft.transactionReference = payload.transactionReference;
    draft.disbursedAt = now;
    if (payload.remarks) draft.remarks.push(payload.remarks);

    const application = reviseApplication(state.application, now);
    const move = moveApplication(application, "disbursed", now, { disbursementSettled: true });
    const metadata = { disbursementId, manual: true };
    const logEntries = [
      decisionEntry(actor, { stage: "finance", action: "transfer_started", amount: draft.amount, metadata }, now),
      decisionEntry(
        actor,
        {
          stage: "finance",
          action: "transfer_succeeded",
          remarks: payload.remarks,
          amount: draft.amount,
          metadata: { ...metadata, transactionReference: payload.transactionReference },
          ...move,
        },
        now,
      ),
    ];
    return { changes: { application, disbursements: [draft], logEntries }, result: draft };
  });

  reportSettlement(ctx, disbursement);
  return disbursement;
}

export async function getDisbursement(
  ctx: EngineContext,
  actor: AuthUser,
  disbursementId: string,
): Promise<DisbursementRecord> {
  const disbursement = await ctx.stores.applications.findDisbursement(disbursementId);
  if (!disbursement) throw new NotFoundError("Disbursement", disbursementId);
  await loadScopedApplication(ctx, actor, disbursement.applicationId);
  return disbursement;
}
