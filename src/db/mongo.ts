import mongoose from "mongoose";
import { env } from "../config/env.js";
import type { LoggerLike } from "../types.js";
import { ApplicationModel, DecisionLogModel, DisbursementModel, IdempotencyKeyModel } from "./models.js";

export interface IndexedModel {
  modelName: string;
  createCollection(): Promise<unknown>;
  syncIndexes(): Promise<string[]>;
}

const engineModels: IndexedModel[] = [ApplicationModel, DecisionLogModel, DisbursementModel, IdempotencyKeyModel];

let connected = false;

/**
 * Units of work run in transactions, which cannot create collections, and
 * rely on the unique indexes (one active disbursement per application, one
 * log sequence number, one command reservation). Both must exist before the
 * first request.
 */
export async function prepareCollections(log: LoggerLike, models: IndexedModel[] = engineModels) {
  for (const model of models) {
    await model.createCollection();
    const dropped = await model.syncIndexes();
    if (dropped.length > 0) {
      log.warn({ model: model.modelName, dropped }, "Dropped indexes no longer declared on the model");
    }
  }
  log.info({ models: models.map((model) => model.modelName) }, "Collections and indexes ready");
}

export async function connectMongo(log: LoggerLike) {
  if (connected) return;
  await mongoose.connect(env.MONGODB_URI, {
    dbName: env.MONGODB_DB_NAME,
  });
  connected = true;
  await prepareCollections(log);
}

export async function disconnectMongo() {
  if (!connected) return;
  await mongoose.disconnect();
  connected = false;
}
