import { InvalidTransitionError, ValidationError } from "./errors.js";
import type { ApplicationStatus, DisbursementStatus } from "./constants.js";

export interface ApplicationTransitionContext {
  departmentRejection?: boolean;
  disbursementSettled?: boolean;
}

export interface DisbursementTransitionContext {
  hasTransactionReference?: boolean;
  hasFailureReason?: boolean;
}

const applicationTransitions: Record<ApplicationStatus, readonly ApplicationStatus[]> = {
  draft: ["submitted"],
  submitted: ["under_review", "rejected"],
  under_review: ["document_verification", "eligibility_check", "approved", "rejected", "on_hold"],
  document_verification: ["eligibility_check", "under_review", "rejected"],
  eligibility_check: ["approved", "partially_approved", "rejected", "under_review"],
  approved: ["disbursed"],
  partially_approved: ["disbursed"],
  rejected: [],
  on_hold: ["under_review", "rejected"],
  cancelled: [],
  disbursed: ["completed"],
  completed: [],
};

// Edges only the department gatekeeper may take
const departmentRejectionTransitions: Partial<Record<ApplicationStatus, readonly ApplicationStatus[]>> = {
  approved: ["rejected"],
  partially_approved: ["rejected"],
};

const disbursementTransitions: Record<DisbursementStatus, readonly DisbursementStatus[]> = {
  pending: ["processing", "cancelled"],
  processing: ["disbursed", "failed"],
  failed: ["processing", "cancelled"],
  disbursed: [],
  cancelled: [],
};

export function isApplicationEdge(fromStatus: ApplicationStatus, toStatus: ApplicationStatus): boolean {
  return applicationTransitions[fromStatus].includes(toStatus);
}

export function applicationSuccessors(fromStatus: ApplicationStatus): readonly ApplicationStatus[] {
  return applicationTransitions[fromStatus];
}

/**
 * Shortest chain of plain edges from `fromStatus` to `toStatus`, passing only
 * through `via`. Returns the statuses visited after `fromStatus`, ending in
 * `toStatus`, or null when no such chain exists.
 */
export function findTransitionPath(
  fromStatus: ApplicationStatus,
  toStatus: ApplicationStatus,
  via: readonly ApplicationStatus[],
): ApplicationStatus[] | null {
  if (fromStatus === toStatus) return null;

  const previous = new Map<ApplicationStatus, ApplicationStatus>();
  const queue: ApplicationStatus[] = [fromStatus];
  const seen = new Set<ApplicationStatus>([fromStatus]);

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of applicationTransitions[current]) {
      if (seen.has(next)) continue;
      seen.add(next);
      previous.set(next, current);
      if (next === toStatus) {
        const path: ApplicationStatus[] = [next];
        let cursor = current;
        while (cursor !== fromStatus) {
          path.unshift(cursor);
          const before = previous.get(cursor);
          if (before === undefined) break;
          cursor = before;
        }
        return path;
      }
      if (via.includes(next)) queue.push(next);
    }
  }
  return null;
}

function invalidTransition(entityType: string, fromStatus: string, toStatus: string): never {
  throw new InvalidTransitionError(entityType, fromStatus, toStatus);
}

type TransitionCheck =
  | [entityType: "application", fromStatus: ApplicationStatus, toStatus: ApplicationStatus, context?: ApplicationTransitionContext]
  | [
      entityType: "disbursement",
      fromStatus: DisbursementStatus,
      toStatus: DisbursementStatus,
      context?: DisbursementTransitionContext,
    ];

export function assertTransition(...check: TransitionCheck): void {
  if (check[0] === "application") {
    const [, fromStatus, toStatus, context] = check;
    assertApplicationTransition(fromStatus, toStatus, context);
    return;
  }

  const [, fromStatus, toStatus, context] = check;
  assertDisbursementTransition(fromStatus, toStatus, context);
}

function assertApplicationTransition(
  fromStatus: ApplicationStatus,
  toStatus: ApplicationStatus,
  context?: ApplicationTransitionContext,
) {
  if (context?.departmentRejection && departmentRejectionTransitions[fromStatus]?.includes(toStatus)) {
    return;
  }

  if (!isApplicationEdge(fromStatus, toStatus)) {
    invalidTransition("application", fromStatus, toStatus);
  }

  if (toStatus === "disbursed" && !context?.disbursementSettled) {
    invalidTransition("application", fromStatus, toStatus);
  }
}

function assertDisbursementTransition(
  fromStatus: DisbursementStatus,
  toStatus: DisbursementStatus,
  context?: DisbursementTransitionContext,
) {
  if (!disbursementTransitions[fromStatus].includes(toStatus)) {
    invalidTransition("disbursement", fromStatus, toStatus);
  }

  if (toStatus === "disbursed" && !context?.hasTransactionReference) {
    throw new ValidationError("Cannot mark disbursement disbursed without a transaction reference");
  }

  if (toStatus === "failed" && !context?.hasFailureReason) {
    throw new ValidationError("Cannot mark disbursement failed without a reason");
  }
}
