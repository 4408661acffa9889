import type { ApplicationStatus, DecisionAction, Stage } from "./constants.js";
import type { DecisionLogDraft } from "../db/records.js";
import type { AuthUser } from "../types.js";

interface DecisionInput {
  stage: Stage;
  action: DecisionAction;
  fromStatus?: ApplicationStatus;
  toStatus?: ApplicationStatus;
  remarks?: string;
  amount?: number | null;
  metadata?: DecisionLogDraft["metadata"];
}

export function decisionEntry(actor: AuthUser, input: DecisionInput, recordedAt: Date): DecisionLogDraft {
  const entry: DecisionLogDraft = {
    stage: input.stage,
    action: input.action,
    actorId: actor.userId,
    actorRole: actor.role,
    remarks: input.remarks ?? "",
    amount: input.amount ?? null,
    recordedAt,
  };
  if (input.fromStatus) entry.fromStatus = input.fromStatus;
  if (input.toStatus) entry.toStatus = input.toStatus;
  if (input.metadata) entry.metadata = input.metadata;
  return entry;
}
