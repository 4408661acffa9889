import { createHash } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";
import type { FastifyRequest } from "fastify";
import type { CommandStore } from "../db/store.js";
import { HttpError } from "./errors.js";

function sortValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortValue);
  if (!value || typeof value !== "object") return value;

  const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
  const out: Record<string, unknown> = {};
  for (const [key, raw] of entries) {
    out[key] = sortValue(raw);
  }
  return out;
}

export function stableJsonStringify(input: unknown): string {
  return JSON.stringify(sortValue(input));
}

export function hashPayload(payload: unknown): string {
  return createHash("sha256").update(stableJsonStringify(payload)).digest("hex");
}

export function readCommandId(headers: IncomingHttpHeaders): string | undefined {
  const raw = headers["x-command-id"];
  if (!raw) return undefined;
  const value = Array.isArray(raw) ? raw[0] : raw;
  const commandId = value?.trim();
  return commandId ? commandId : undefined;
}

interface IdempotencyOptions<T> {
  commands: CommandStore;
  commandId?: string;
  userId: string;
  route: string;
  payload: unknown;
  now: Date;
  execute: () => Promise<T>;
}

function commandReused(): HttpError {
  return new HttpError(409, "Command ID already used with a different payload", undefined, "CONFLICT");
}

/**
 * Reserves the command id before running, so concurrent requests with the
 * same id run the command once. Stored responses are returned as persisted;
 * callers pass plain JSON (already serialized) bodies so a replay is
 * indistinguishable from the first response.
 */
export async function runIdempotentCommand<T>({
  commands,
  commandId,
  userId,
  route,
  payload,
  now,
  execute,
}: IdempotencyOptions<T>): Promise<unknown> {
  if (!commandId) return execute();

  const requestHash = hashPayload(payload);
  const holder = await commands.reserve({ key: commandId, userId, route, requestHash, createdAt: now });

  if (holder) {
    if (holder.requestHash !== requestHash) throw commandReused();
    if (holder.state === "pending") {
      throw new HttpError(409, "Command with this ID is still in progress", undefined, "CONFLICT");
    }
    return holder.responseBody;
  }

  let responseBody: T;
  try {
    responseBody = await execute();
  } catch (error) {
    await commands.release(commandId, userId, route);
    throw error;
  }
  await commands.complete(commandId, userId, route, responseBody);
  return responseBody;
}

/** Runs a mutating route under the caller's `x-command-id`, if any. */
export function runRequestCommand(
  request: FastifyRequest,
  route: string,
  payload: unknown,
  execute: () => Promise<unknown>,
): Promise<unknown> {
  const ctx = request.server.engine;
  return runIdempotentCommand({
    commands: ctx.stores.commands,
    commandId: readCommandId(request.headers),
    userId: request.authUser.userId,
    route,
    payload,
    now: ctx.now(),
    execute,
  });
}
