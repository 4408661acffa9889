import type { ApplicationRecord, ApplicationTimestamps } from "../../../db/records.js";
import type { ApplicationStatus, Role, Stage } from "../../../utils/constants.js";
import { assertTransition, type ApplicationTransitionContext } from "../../../utils/state-machine.js";
import { daysPending, isOverdue } from "../../../utils/sla.js";

export interface ApplicationView extends ApplicationRecord {
  daysPending: number;
  isOverdue: boolean;
}

/** Copy of `application` that a unit of work may change and write back. */
export function reviseApplication(application: ApplicationRecord, now: Date): ApplicationRecord {
  return {
    ...structuredClone(application),
    version: application.version + 1,
    updatedAt: now,
  };
}

function stampStatus(timestamps: ApplicationTimestamps, toStatus: ApplicationStatus, at: Date) {
  switch (toStatus) {
    case "submitted":
      timestamps.submittedAt = at;
      break;
    case "under_review":
      timestamps.reviewStartedAt ??= at;
      break;
    case "approved":
    case "partially_approved":
      timestamps.approvedAt = at;
      timestamps.reviewCompletedAt = at;
      break;
    case "rejected":
      timestamps.rejectedAt = at;
      timestamps.reviewCompletedAt = at;
      break;
    case "on_hold":
      timestamps.onHoldAt = at;
      break;
    case "disbursed":
      timestamps.disbursedAt = at;
      break;
    case "completed":
      timestamps.completedAt = at;
      break;
    default:
      break;
  }
}

/** Validates the edge, then sets status and its timestamp on the revised record. */
export function moveApplication(
  draft: ApplicationRecord,
  toStatus: ApplicationStatus,
  at: Date,
  context?: ApplicationTransitionContext,
): { fromStatus: ApplicationStatus; toStatus: ApplicationStatus } {
  const fromStatus = draft.status;
  assertTransition("application", fromStatus, toStatus, context);
  draft.status = toStatus;
  stampStatus(draft.timestamps, toStatus, at);
  return { fromStatus, toStatus };
}

export function stageForRole(role: Role): Stage {
  switch (role) {
    case "student":
      return "intake";
    case "department_admin":
      return "department";
    case "finance_admin":
      return "finance";
    case "institute_admin":
    case "admin":
      return "institute";
  }
}

export function toApplicationView(application: ApplicationRecord, now: Date, slaDays: number): ApplicationView {
  return {
    ...application,
    daysPending: daysPending(application, now),
    isOverdue: isOverdue(application, now, slaDays),
  };
}
