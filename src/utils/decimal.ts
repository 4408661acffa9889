import mongoose from "mongoose";
import { amountToCents, centsToNumber, formatCents } from "./money.js";

export function toDecimal(value: number | mongoose.Types.Decimal128) {
  if (value instanceof mongoose.Types.Decimal128) return value;
  return mongoose.Types.Decimal128.fromString(formatCents(amountToCents(value)));
}

export function decimalToNumber(value: mongoose.Types.Decimal128): number {
  return centsToNumber(amountToCents(value.toString()));
}

export function optionalDecimal(value: number | null) {
  return value === null ? null : toDecimal(value);
}

export function optionalDecimalToNumber(value: mongoose.Types.Decimal128 | null | undefined): number | null {
  return value ? decimalToNumber(value) : null;
}
