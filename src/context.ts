import type { EventEmitter } from "node:events";
import type { Stores } from "./db/store.js";
import type { TransferGateway } from "./services/transfer-gateway.js";
import type { LoggerLike } from "./types.js";

export interface EngineSettings {
  slaDays: number;
  enforceAmountCeiling: boolean;
}

/** Collaborators every engine operation runs against. */
export interface EngineContext {
  stores: Stores;
  gateway: TransferGateway;
  events: EventEmitter;
  log: LoggerLike;
  now: () => Date;
  settings: EngineSettings;
}
