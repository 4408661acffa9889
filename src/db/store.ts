import type { ApplicationStatus, Priority } from "../utils/constants.js";
import type { QueueSort } from "../utils/queue.js";
import type {
  ApplicationRecord,
  DecisionLogDraft,
  DecisionLogEntry,
  DisbursementRecord,
} from "./records.js";

/**
 * Snapshot handed to a unit of work. Everything the engine mutates for one
 * application (the application itself and its disbursements) is loaded and
 * written together.
 */
export interface ApplicationState {
  application: ApplicationRecord;
  disbursements: DisbursementRecord[];
  logLength: number;
}

/**
 * Writes produced by a unit of work. Changed records must carry
 * `version = loaded version + 1`; new disbursements start at version 1.
 */
export interface ApplicationChanges {
  application?: ApplicationRecord;
  disbursements?: DisbursementRecord[];
  logEntries?: DecisionLogDraft[];
}

export interface UnitOutcome<T> {
  changes: ApplicationChanges;
  result: T;
}

/**
 * Must be free of side effects outside the returned changes: a store may run
 * it again against a fresh snapshot after losing a race.
 */
export type UnitOfWork<T> = (state: ApplicationState) => UnitOutcome<T> | Promise<UnitOutcome<T>>;

export interface ApplicationFilter {
  statuses?: ApplicationStatus[];
  priority?: Priority;
  instituteId?: string;
  departmentId?: string;
  instituteApproved?: boolean;
  departmentDecided?: boolean;
  departmentApproved?: boolean;
  forwarded?: boolean;
}

export interface PageRequest {
  skip: number;
  limit: number;
  sort: QueueSort;
}

export interface ApplicationStore {
  insertApplication(application: ApplicationRecord, logEntries: DecisionLogDraft[]): Promise<void>;
  findApplication(applicationId: string): Promise<ApplicationRecord | null>;
  listApplications(
    filter: ApplicationFilter,
    page: PageRequest,
  ): Promise<{ rows: ApplicationRecord[]; total: number }>;
  findDisbursement(disbursementId: string): Promise<DisbursementRecord | null>;
  listDisbursements(applicationId: string): Promise<DisbursementRecord[]>;
  listDecisionLog(applicationId: string): Promise<DecisionLogEntry[]>;
  /** Read, validate and write one application atomically. Throws 404 for unknown ids. */
  mutate<T>(applicationId: string, work: UnitOfWork<T>): Promise<T>;
}

export type CommandState = "pending" | "completed";

export interface CommandRecord {
  key: string;
  userId: string;
  route: string;
  requestHash: string;
  state: CommandState;
  /** Null while the command is pending. */
  responseBody: unknown;
  createdAt: Date;
}

export type CommandReservation = Pick<CommandRecord, "key" | "userId" | "route" | "requestHash" | "createdAt">;

export interface CommandStore {
  find(key: string, userId: string, route: string): Promise<CommandRecord | null>;
  /**
   * Claims the key as pending. Returns null when this caller now owns it,
   * otherwise the record already holding it.
   */
  reserve(reservation: CommandReservation): Promise<CommandRecord | null>;
  complete(key: string, userId: string, route: string, responseBody: unknown): Promise<void>;
  /** Frees a pending key so the command can run again. */
  release(key: string, userId: string, route: string): Promise<void>;
}

export interface Stores {
  applications: ApplicationStore;
  commands: CommandStore;
}

export function matchesFilter(application: ApplicationRecord, filter: ApplicationFilter): boolean {
  if (filter.statuses && !filter.statuses.includes(application.status)) return false;
  if (filter.priority && application.priority !== filter.priority) return false;
  if (filter.instituteId && application.instituteId !== filter.instituteId) return false;
  if (filter.departmentId && application.departmentId !== filter.departmentId) return false;

  const { institute, department, financeForward } = application.decisions;
  if (filter.instituteApproved !== undefined) {
    const approved = institute.decided && institute.outcome === "approved";
    if (approved !== filter.instituteApproved) return false;
  }
  if (filter.departmentDecided !== undefined && department.decided !== filter.departmentDecided) {
    return false;
  }
  if (filter.departmentApproved !== undefined) {
    const approved = department.decided && department.outcome === "approved";
    if (approved !== filter.departmentApproved) return false;
  }
  if (filter.forwarded !== undefined && financeForward.forwarded !== filter.forwarded) return false;
  return true;
}
