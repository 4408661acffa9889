import { randomBytes } from "node:crypto";

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function upperHex(bytes: number): string {
  return randomBytes(bytes).toString("hex").toUpperCase();
}

function compactDate(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

export function newApplicationId(now: Date): string {
  return `APP${now.getUTCFullYear()}${upperHex(4)}`;
}

export function newDisbursementId(now: Date): string {
  return `DSB${compactDate(now)}${upperHex(4)}`;
}

export function newTransferBatchId(now: Date): string {
  return `DBT${compactDate(now)}${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${upperHex(3)}`;
}

export function newReviewBatchId(now: Date): string {
  return `BR${compactDate(now)}${upperHex(4)}`;
}

export function newForwardBatchId(now: Date): string {
  return `FWD${compactDate(now)}${upperHex(4)}`;
}

export function newEntryId(): string {
  return randomBytes(12).toString("hex");
}
