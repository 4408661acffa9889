import { Schema } from "mongoose";

// Engine records carry their own createdAt/updatedAt/version, stamped from the
// injected clock, so mongoose must not add or rewrite them.
export const engineOwned = { versionKey: false, timestamps: false } as const;

export const bankAccountSchema = new Schema(
  {
    accountNumber: { type: String },
    routingCode: { type: String },
  },
  { _id: false },
);
