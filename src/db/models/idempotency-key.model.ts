import mongoose, { Schema } from "mongoose";

export interface IdempotencyKeyDoc {
  key: string;
  userId: string;
  route: string;
  requestHash: string;
  state: "pending" | "completed";
  responseBody: unknown;
  createdAt: Date;
}

const idempotencySchema = new Schema<IdempotencyKeyDoc>(
  {
    key: { type: String, required: true },
    userId: { type: String, required: true },
    route: { type: String, required: true },
    requestHash: { type: String, required: true },
    state: { type: String, enum: ["pending", "completed"], required: true },
    responseBody: { type: Schema.Types.Mixed, default: null },
    createdAt: { type: Date, required: true },
  },
  { versionKey: false, collection: "idempotencyKeys" },
);
idempotencySchema.index({ key: 1, userId: 1, route: 1 }, { unique: true });

export const IdempotencyKeyModel =
  (mongoose.models.IdempotencyKey as mongoose.Model<IdempotencyKeyDoc> | undefined) ??
  mongoose.model<IdempotencyKeyDoc>("IdempotencyKey", idempotencySchema);
