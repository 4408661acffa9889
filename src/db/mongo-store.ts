import type mongoose from "mongoose";
import {
  ApplicationModel,
  DecisionLogModel,
  DisbursementModel,
  IdempotencyKeyModel,
  type ApplicationDoc,
  type DecisionLogDoc,
  type DisbursementDoc,
} from "./models.js";
import type { FinanceForwardDoc, StageDecisionDoc } from "./models/application.model.js";
import type {
  ApplicationRecord,
  BankAccount,
  DecisionLogDraft,
  DecisionLogEntry,
  DisbursementRecord,
  FinanceForward,
  StageDecision,
} from "./records.js";
import type {
  ApplicationChanges,
  ApplicationFilter,
  ApplicationState,
  ApplicationStore,
  CommandRecord,
  CommandReservation,
  CommandStore,
  PageRequest,
  Stores,
  UnitOfWork,
} from "./store.js";
import { ConcurrencyConflictError, NotFoundError } from "../utils/errors.js";
import { decimalToNumber, optionalDecimal, optionalDecimalToNumber, toDecimal } from "../utils/decimal.js";
import { newEntryId } from "../utils/ids.js";
import type { QueueSort } from "../utils/queue.js";
import { runInTransaction } from "../utils/tx.js";
import type { LoggerLike } from "../types.js";

type Session = mongoose.ClientSession | null;

/** A guarded write matched nothing: another unit committed first. */
class StaleWriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StaleWriteError";
  }
}

function isDuplicateKey(error: unknown): boolean {
  return Boolean(error && typeof error === "object" && "code" in error && error.code === 11000);
}

function bankAccountFromDoc(doc: DisbursementDoc["bankAccount"] | undefined): BankAccount {
  const account: BankAccount = {};
  if (doc?.accountNumber) account.accountNumber = doc.accountNumber;
  if (doc?.routingCode) account.routingCode = doc.routingCode;
  return account;
}

function stageDecisionFromDoc(doc: StageDecisionDoc): StageDecision {
  if (!doc.decided) return { decided: false };
  if (!doc.outcome || !doc.actorId || !doc.decidedAt) {
    throw new Error("Stored stage decision is missing its outcome, actor or date");
  }
  return {
    decided: true,
    outcome: doc.outcome,
    actorId: doc.actorId,
    remarks: doc.remarks ?? "",
    amount: optionalDecimalToNumber(doc.amount),
    decidedAt: doc.decidedAt,
  };
}

function stageDecisionToDoc(decision: StageDecision): StageDecisionDoc {
  if (!decision.decided) {
    return { decided: false, outcome: null, actorId: null, remarks: null, amount: null, decidedAt: null };
  }
  return {
    decided: true,
    outcome: decision.outcome,
    actorId: decision.actorId,
    remarks: decision.remarks,
    amount: optionalDecimal(decision.amount),
    decidedAt: decision.decidedAt,
  };
}

function financeForwardFromDoc(doc: FinanceForwardDoc): FinanceForward {
  if (!doc.forwarded) return { forwarded: false };
  if (!doc.actorId || !doc.priority || !doc.batchId || !doc.amount || !doc.forwardedAt) {
    throw new Error("Stored finance forward is incomplete");
  }
  return {
    forwarded: true,
    actorId: doc.actorId,
    remarks: doc.remarks ?? "",
    priority: doc.priority,
    batchId: doc.batchId,
    amount: decimalToNumber(doc.amount),
    forwardedAt: doc.forwardedAt,
  };
}

function financeForwardToDoc(forward: FinanceForward): FinanceForwardDoc {
  if (!forward.forwarded) {
    return {
      forwarded: false,
      actorId: null,
      remarks: null,
      priority: null,
      batchId: null,
      amount: null,
      forwardedAt: null,
    };
  }
  return {
    forwarded: true,
    actorId: forward.actorId,
    remarks: forward.remarks,
    priority: forward.priority,
    batchId: forward.batchId,
    amount: toDecimal(forward.amount),
    forwardedAt: forward.forwardedAt,
  };
}

export function applicationFromDoc(doc: ApplicationDoc): ApplicationRecord {
  const studentProfile: ApplicationRecord["studentProfile"] = {};
  if (typeof doc.studentProfile?.cgpa === "number") studentProfile.cgpa = doc.studentProfile.cgpa;
  if (doc.studentProfile?.courseLevel) studentProfile.courseLevel = doc.studentProfile.courseLevel;

  return {
    applicationId: doc.applicationId,
    studentId: doc.studentId,
    instituteId: doc.instituteId,
    departmentId: doc.departmentId,
    scholarshipType: doc.scholarshipType,
    scholarshipName: doc.scholarshipName,
    schemeReference: doc.schemeReference ?? null,
    requestedAmount: decimalToNumber(doc.requestedAmount),
    approvedAmount: optionalDecimalToNumber(doc.approvedAmount),
    academicYear: doc.academicYear ?? null,
    priority: doc.priority,
    eligibilityScore: doc.eligibilityScore,
    documentCompletenessScore: doc.documentCompletenessScore,
    studentProfile,
    bankAccount: bankAccountFromDoc(doc.bankAccount),
    status: doc.status,
    timestamps: {
      submittedAt: doc.timestamps.submittedAt ?? null,
      reviewStartedAt: doc.timestamps.reviewStartedAt ?? null,
      reviewCompletedAt: doc.timestamps.reviewCompletedAt ?? null,
      approvedAt: doc.timestamps.approvedAt ?? null,
      rejectedAt: doc.timestamps.rejectedAt ?? null,
      onHoldAt: doc.timestamps.onHoldAt ?? null,
      disbursedAt: doc.timestamps.disbursedAt ?? null,
      completedAt: doc.timestamps.completedAt ?? null,
    },
    decisions: {
      institute: stageDecisionFromDoc(doc.decisions.institute),
      department: stageDecisionFromDoc(doc.decisions.department),
      financeForward: financeForwardFromDoc(doc.decisions.financeForward),
    },
    version: doc.version,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function applicationToDoc(record: ApplicationRecord): ApplicationDoc {
  return {
    ...record,
    requestedAmount: toDecimal(record.requestedAmount),
    approvedAmount: optionalDecimal(record.approvedAmount),
    decisions: {
      institute: stageDecisionToDoc(record.decisions.institute),
      department: stageDecisionToDoc(record.decisions.department),
      financeForward: financeForwardToDoc(record.decisions.financeForward),
    },
  };
}

export function disbursementFromDoc(doc: DisbursementDoc): DisbursementRecord {
  return {
    disbursementId: doc.disbursementId,
    applicationId: doc.applicationId,
    amount: decimalToNumber(doc.amount),
    method: doc.method,
    status: doc.status,
    bankAccount: bankAccountFromDoc(doc.bankAccount),
    transactionReference: doc.transactionReference ?? null,
    failureReason: doc.failureReason ?? null,
    batchId: doc.batchId ?? null,
    attempts: doc.attempts,
    disbursedAt: doc.disbursedAt ?? null,
    remarks: [...doc.remarks],
    createdBy: doc.createdBy,
    version: doc.version,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function disbursementToDoc(record: DisbursementRecord): DisbursementDoc {
  return {
    ...record,
    activeApplicationId: record.status === "cancelled" ? null : record.applicationId,
    amount: toDecimal(record.amount),
  };
}

function logEntryFromDoc(doc: DecisionLogDoc): DecisionLogEntry {
  const entry: DecisionLogEntry = {
    entryId: doc.entryId,
    applicationId: doc.applicationId,
    sequence: doc.sequence,
    stage: doc.stage,
    action: doc.action,
    actorId: doc.actorId,
    actorRole: doc.actorRole,
    remarks: doc.remarks,
    amount: optionalDecimalToNumber(doc.amount),
    recordedAt: doc.recordedAt,
  };
  if (doc.fromStatus) entry.fromStatus = doc.fromStatus;
  if (doc.toStatus) entry.toStatus = doc.toStatus;
  if (doc.metadata) entry.metadata = doc.metadata;
  return entry;
}

function logEntryToDoc(applicationId: string, sequence: number, draft: DecisionLogDraft): DecisionLogDoc {
  return {
    entryId: newEntryId(),
    applicationId,
    sequence,
    stage: draft.stage,
    action: draft.action,
    fromStatus: draft.fromStatus ?? null,
    toStatus: draft.toStatus ?? null,
    actorId: draft.actorId,
    actorRole: draft.actorRole,
    remarks: draft.remarks,
    amount: optionalDecimal(draft.amount),
    metadata: draft.metadata ?? null,
    recordedAt: draft.recordedAt,
  };
}

export function filterToQuery(filter: ApplicationFilter): mongoose.FilterQuery<ApplicationDoc> {
  const query: mongoose.FilterQuery<ApplicationDoc> = {};
  const clauses: mongoose.FilterQuery<ApplicationDoc>[] = [];

  if (filter.statuses) query.status = { $in: filter.statuses };
  if (filter.priority) query.priority = filter.priority;
  if (filter.instituteId) query.instituteId = filter.instituteId;
  if (filter.departmentId) query.departmentId = filter.departmentId;

  if (filter.instituteApproved !== undefined) {
    const approved = { "decisions.institute.decided": true, "decisions.institute.outcome": "approved" };
    clauses.push(filter.instituteApproved ? approved : { $nor: [approved] });
  }
  if (filter.departmentDecided !== undefined) {
    clauses.push({ "decisions.department.decided": filter.departmentDecided });
  }
  if (filter.departmentApproved !== undefined) {
    const approved = { "decisions.department.decided": true, "decisions.department.outcome": "approved" };
    clauses.push(filter.departmentApproved ? approved : { $nor: [approved] });
  }
  if (filter.forwarded !== undefined) {
    clauses.push({ "decisions.financeForward.forwarded": filter.forwarded });
  }

  if (clauses.length > 0) query.$and = clauses;
  return query;
}

const sortOrders: Record<QueueSort, Record<string, 1 | -1>> = {
  oldest: { createdAt: 1, applicationId: 1 },
  newest: { createdAt: -1, applicationId: 1 },
  largest: { requestedAmount: -1, createdAt: 1, applicationId: 1 },
};

export function sortFor(sort: QueueSort): Record<string, 1 | -1> {
  return sortOrders[sort];
}

interface MongoStoreOptions {
  maxConflictRetries: number;
  log: LoggerLike;
}

export class MongoApplicationStore implements ApplicationStore {
  constructor(private readonly options: MongoStoreOptions) {}

  async insertApplication(application: ApplicationRecord, logEntries: DecisionLogDraft[]): Promise<void> {
    await runInTransaction(async (session) => {
      await ApplicationModel.create([applicationToDoc(application)], { session });
      if (logEntries.length > 0) {
        await DecisionLogModel.create(
          logEntries.map((entry, index) => logEntryToDoc(application.applicationId, index + 1, entry)),
          { session, ordered: true },
        );
      }
    }, { onUnsupported: () => this.warnNoTransactions() });
  }

  async findApplication(applicationId: string): Promise<ApplicationRecord | null> {
    const doc = await ApplicationModel.findOne({ applicationId }).lean<ApplicationDoc>();
    return doc ? applicationFromDoc(doc) : null;
  }

  async listApplications(filter: ApplicationFilter, page: PageRequest) {
    const query = filterToQuery(filter);
    const [docs, total] = await Promise.all([
      ApplicationModel.find(query)
        .sort(sortFor(page.sort))
        .skip(page.skip)
        .limit(page.limit)
        .lean<ApplicationDoc[]>(),
      ApplicationModel.countDocuments(query),
    ]);
    return { rows: docs.map(applicationFromDoc), total };
  }

  async findDisbursement(disbursementId: string): Promise<DisbursementRecord | null> {
    const doc = await DisbursementModel.findOne({ disbursementId }).lean<DisbursementDoc>();
    return doc ? disbursementFromDoc(doc) : null;
  }

  async listDisbursements(applicationId: string): Promise<DisbursementRecord[]> {
    const docs = await DisbursementModel.find({ applicationId })
      .sort({ createdAt: 1 })
      .lean<DisbursementDoc[]>();
    return docs.map(disbursementFromDoc);
  }

  async listDecisionLog(applicationId: string): Promise<DecisionLogEntry[]> {
    const docs = await DecisionLogModel.find({ applicationId })
      .sort({ sequence: 1 })
      .lean<DecisionLogDoc[]>();
    return docs.map(logEntryFromDoc);
  }

  async mutate<T>(applicationId: string, work: UnitOfWork<T>): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await runInTransaction(async (session) => {
          const state = await this.loadState(applicationId, session);
          const { changes, result } = await work(state);
          await this.writeChanges(state, changes, session);
          return result;
        }, { onUnsupported: () => this.warnNoTransactions() });
      } catch (error) {
        if (!(error instanceof StaleWriteError)) throw error;
        if (attempt > this.options.maxConflictRetries) {
          this.options.log.warn({ applicationId, attempt }, "Giving up after repeated write conflicts");
          throw new ConcurrencyConflictError("Application", applicationId);
        }
        this.options.log.info({ applicationId, attempt, reason: error.message }, "Retrying unit of work");
      }
    }
  }

  private warnNoTransactions() {
    this.options.log.warn({}, "MongoDB transactions are unavailable; writing without a session");
  }

  private async loadState(applicationId: string, session: Session): Promise<ApplicationState> {
    const doc = await ApplicationModel.findOne({ applicationId }).session(session).lean<ApplicationDoc>();
    if (!doc) throw new NotFoundError("Application", applicationId);

    const [disbursements, logLength] = await Promise.all([
      DisbursementModel.find({ applicationId }).sort({ createdAt: 1 }).session(session).lean<DisbursementDoc[]>(),
      DecisionLogModel.countDocuments({ applicationId }).session(session),
    ]);

    return {
      application: applicationFromDoc(doc),
      disbursements: disbursements.map(disbursementFromDoc),
      logLength,
    };
  }

  private async writeChanges(state: ApplicationState, changes: ApplicationChanges, session: Session) {
    const touched =
      changes.application !== undefined ||
      (changes.disbursements?.length ?? 0) > 0 ||
      (changes.logEntries?.length ?? 0) > 0;
    if (!touched) return;

    const loaded = state.application;
    const expectedVersion = loaded.version + 1;
    if (changes.application && changes.application.version !== expectedVersion) {
      throw new Error(`Application ${loaded.applicationId} written with version ${changes.application.version}`);
    }

    // Every unit bumps the application version, so it doubles as the per-application guard.
    const next = changes.application ? applicationToDoc(changes.application) : { version: expectedVersion };
    const updated = await ApplicationModel.updateOne(
      { applicationId: loaded.applicationId, version: loaded.version },
      { $set: next },
      { session },
    );
    if (updated.matchedCount === 0) {
      throw new StaleWriteError(`Application ${loaded.applicationId} changed since version ${loaded.version}`);
    }

    try {
      for (const disbursement of changes.disbursements ?? []) {
        await this.writeDisbursement(state, disbursement, session);
      }

      const drafts = changes.logEntries ?? [];
      if (drafts.length > 0) {
        await DecisionLogModel.create(
          drafts.map((draft, index) => logEntryToDoc(loaded.applicationId, state.logLength + index + 1, draft)),
          { session, ordered: true },
        );
      }
    } catch (error) {
      if (isDuplicateKey(error)) {
        throw new StaleWriteError(`Duplicate key while writing application ${loaded.applicationId}`);
      }
      throw error;
    }
  }

  private async writeDisbursement(state: ApplicationState, record: DisbursementRecord, session: Session) {
    const previous = state.disbursements.find((item) => item.disbursementId === record.disbursementId);

    if (!previous) {
      if (record.version !== 1) {
        throw new Error(`New disbursement ${record.disbursementId} must start at version 1`);
      }
      await DisbursementModel.create([disbursementToDoc(record)], { session });
      return;
    }

    if (record.version !== previous.version + 1) {
      throw new Error(`Disbursement ${record.disbursementId} written with version ${record.version}`);
    }
    const updated = await DisbursementModel.updateOne(
      { disbursementId: record.disbursementId, version: previous.version },
      { $set: disbursementToDoc(record) },
      { session },
    );
    if (updated.matchedCount === 0) {
      throw new StaleWriteError(`Disbursement ${record.disbursementId} changed since version ${previous.version}`);
    }
  }
}

const RESERVE_ATTEMPTS = 3;

export class MongoCommandStore implements CommandStore {
  async find(key: string, userId: string, route: string): Promise<CommandRecord | null> {
    const doc = await IdempotencyKeyModel.findOne({ key, userId, route }).lean<CommandRecord>();
    if (!doc) return null;
    return {
      key: doc.key,
      userId: doc.userId,
      route: doc.route,
      requestHash: doc.requestHash,
      state: doc.state,
      responseBody: doc.responseBody,
      createdAt: doc.createdAt,
    };
  }

  /** The unique (key, userId, route) index decides which caller owns the command. */
  async reserve(reservation: CommandReservation): Promise<CommandRecord | null> {
    for (let attempt = 1; attempt <= RESERVE_ATTEMPTS; attempt += 1) {
      try {
        await IdempotencyKeyModel.create({ ...reservation, state: "pending", responseBody: null });
        return null;
      } catch (error) {
        if (!isDuplicateKey(error)) throw error;
      }
      const holder = await this.find(reservation.key, reservation.userId, reservation.route);
      // Released between the insert and the read: try to claim it again.
      if (holder) return holder;
    }
    throw new ConcurrencyConflictError("Command", reservation.key);
  }

  async complete(key: string, userId: string, route: string, responseBody: unknown): Promise<void> {
    await IdempotencyKeyModel.updateOne({ key, userId, route }, { $set: { state: "completed", responseBody } });
  }

  async release(key: string, userId: string, route: string): Promise<void> {
    await IdempotencyKeyModel.deleteOne({ key, userId, route, state: "pending" });
  }
}

export function createMongoStores(options: MongoStoreOptions): Stores {
  return {
    applications: new MongoApplicationStore(options),
    commands: new MongoCommandStore(),
  };
}
