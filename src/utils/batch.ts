import type { LoggerLike } from "../types.js";
import { HttpError, type ErrorCode } from "./errors.js";

export interface BatchItemResult<T> {
  id: string;
  status: "success" | "failed";
  data?: T;
  code?: ErrorCode;
  error?: string;
}

export interface BatchResult<T> {
  batchId: string;
  total: number;
  processed: number;
  failed: number;
  results: BatchItemResult<T>[];
}

interface BatchOptions<T> {
  batchId: string;
  ids: readonly string[];
  operation: string;
  log: LoggerLike;
  work: (id: string) => Promise<T>;
}

/**
 * Runs `work` for each id in order, each in its own unit. One item failing
 * never stops the rest; its error is reported on the item.
 */
export async function runBatch<T>({ batchId, ids, operation, log, work }: BatchOptions<T>): Promise<BatchResult<T>> {
  const results: BatchItemResult<T>[] = [];

  for (const id of ids) {
    try {
      const data = await work(id);
      results.push({ id, status: "success", data });
    } catch (error) {
      if (error instanceof HttpError) {
        results.push({ id, status: "failed", code: error.code, error: error.message });
        continue;
      }
      log.error({ err: error, batchId, id, operation }, "Unexpected failure in batch item");
      results.push({ id, status: "failed", code: "INTERNAL", error: "Internal error" });
    }
  }

  const processed = results.filter((item) => item.status === "success").length;
  log.info({ batchId, operation, total: ids.length, processed }, "Batch finished");
  return {
    batchId,
    total: ids.length,
    processed,
    failed: ids.length - processed,
    results,
  };
}
