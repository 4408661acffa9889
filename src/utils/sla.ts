import type { ApplicationRecord } from "../db/records.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const slaTrackedStatuses = new Set(["submitted", "under_review"]);

export function daysPending(application: Pick<ApplicationRecord, "timestamps">, now: Date): number {
  const { submittedAt } = application.timestamps;
  if (!submittedAt) return 0;
  return Math.max(0, Math.floor((now.getTime() - submittedAt.getTime()) / DAY_MS));
}

/** Overdue once more than `slaDays` whole days have passed while awaiting review. */
export function isOverdue(
  application: Pick<ApplicationRecord, "status" | "timestamps">,
  now: Date,
  slaDays: number,
): boolean {
  if (!slaTrackedStatuses.has(application.status)) return false;
  return daysPending(application, now) > slaDays;
}
