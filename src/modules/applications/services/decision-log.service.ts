import type { DecisionLogEntry, StageDecision, StageDecisions } from "../../../db/records.js";
import { priorities, type Priority } from "../../../utils/constants.js";

function isPriority(value: unknown): value is Priority {
  return typeof value === "string" && priorities.some((priority) => priority === value);
}

function decided(entry: DecisionLogEntry, outcome: "approved" | "rejected"): StageDecision {
  return {
    decided: true,
    outcome,
    actorId: entry.actorId,
    remarks: entry.remarks,
    amount: entry.amount,
    decidedAt: entry.recordedAt,
  };
}

/**
 * Rebuilds the per-stage decisions from an application's log. The result must
 * equal the stored `decisions`; a mismatch means the record was written
 * without its entry.
 */
export function replayDecisionState(entries: readonly DecisionLogEntry[]): StageDecisions {
  const state: StageDecisions = {
    institute: { decided: false },
    department: { decided: false },
    financeForward: { forwarded: false },
  };

  const ordered = [...entries].sort((a, b) => a.sequence - b.sequence);
  for (const entry of ordered) {
    switch (entry.action) {
      case "institute_approve":
      case "institute_partially_approve":
        state.institute = decided(entry, "approved");
        break;
      case "institute_reject":
        state.institute = decided(entry, "rejected");
        break;
      case "dept_approve":
        state.department = decided(entry, "approved");
        break;
      case "dept_reject":
        state.department = decided(entry, "rejected");
        break;
      case "forward_to_finance": {
        const batchId = entry.metadata?.batchId;
        const priority = entry.metadata?.priority;
        if (typeof batchId !== "string" || !isPriority(priority) || entry.amount === null) {
          throw new Error(`Forward entry ${entry.entryId} is missing batch metadata`);
        }
        state.financeForward = {
          forwarded: true,
          actorId: entry.actorId,
          remarks: entry.remarks,
          priority,
          batchId,
          amount: entry.amount,
          forwardedAt: entry.recordedAt,
        };
        break;
      }
      default:
        break;
    }
  }

  return state;
}
