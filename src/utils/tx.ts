import mongoose from "mongoose";

function isTransactionUnsupported(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;

  const code = "code" in error ? error.code : undefined;
  const codeName = "codeName" in error ? error.codeName : undefined;
  if (code === 20 || codeName === "IllegalOperation") {
    return true;
  }

  const message = error instanceof Error ? error.message : "";
  return (
    message.includes("Transaction numbers are only allowed on a replica set member or mongos") ||
    message.includes("transactions are not supported")
  );
}

interface TransactionOptions {
  onUnsupported?: () => void;
}

/**
 * Runs `fn` inside a MongoDB transaction. Standalone servers reject
 * transactions; there `fn` runs once more without a session.
 */
export async function runInTransaction<T>(
  fn: (session: mongoose.ClientSession | null) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> {
  const session = await mongoose.startSession();
  try {
    let outcome: { value: T } | undefined;
    try {
      await session.withTransaction(async () => {
        outcome = { value: await fn(session) };
      });
    } catch (error) {
      if (!isTransactionUnsupported(error)) throw error;
      options.onUnsupported?.();
      return await fn(null);
    }

    if (!outcome) throw new Error("Transaction finished without a result");
    return outcome.value;
  } finally {
    await session.endSession();
  }
}
