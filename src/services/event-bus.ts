import { EventEmitter } from "node:events";
import type { LoggerLike } from "../types.js";

export interface EngineEvents {
  "application.approved": {
    applicationId: string;
    stage: "institute" | "department";
    actorId: string;
    amount: number | null;
  };
  "application.rejected": {
    applicationId: string;
    stage: "institute" | "department";
    actorId: string;
  };
  "application.forwarded": {
    applicationId: string;
    batchId: string;
    amount: number;
  };
  "disbursement.completed": {
    applicationId: string;
    disbursementId: string;
    amount: number;
    transactionReference: string;
  };
  "disbursement.failed": {
    applicationId: string;
    disbursementId: string;
    reason: string;
  };
}

export type EngineEventName = keyof EngineEvents;

export const engineEventNames: EngineEventName[] = [
  "application.approved",
  "application.rejected",
  "application.forwarded",
  "disbursement.completed",
  "disbursement.failed",
];

/**
 * In-process bus for engine events consumed by notification and reporting
 * collaborators. Delivery is fire-and-forget.
 */
export const eventBus = new EventEmitter();

export function emitEngineEvent<E extends EngineEventName>(
  bus: EventEmitter,
  log: LoggerLike,
  name: E,
  payload: EngineEvents[E],
): void {
  try {
    bus.emit(name, payload);
  } catch (error) {
    log.error({ err: error, event: name }, "Engine event listener failed");
  }
}

export function onEngineEvent<E extends EngineEventName>(
  bus: EventEmitter,
  name: E,
  listener: (payload: EngineEvents[E]) => void,
): () => void {
  bus.on(name, listener);
  return () => {
    bus.off(name, listener);
  };
}
