import { describe, it, expect, vi } from "vitest";
import { MemoryCommandStore } from "../../test/memory-store.js";
import { HttpError } from "../errors.js";
import { hashPayload, readCommandId, runIdempotentCommand, stableJsonStringify } from "../idempotency.js";

const now = new Date("2025-03-10T09:00:00.000Z");

describe("stableJsonStringify()", () => {
  it("sorts keys at every depth", () => {
    expect(stableJsonStringify({ b: 1, a: { d: [{ z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}',
    );
  });

  it("hashes equal payloads equally regardless of key order", () => {
    expect(hashPayload({ remarks: "ok", amount: 10 })).toBe(hashPayload({ amount: 10, remarks: "ok" }));
    expect(hashPayload({ amount: 10 })).not.toBe(hashPayload({ amount: 11 }));
  });
});

describe("readCommandId()", () => {
  it("trims the header and ignores blanks", () => {
    expect(readCommandId({ "x-command-id": "  cmd-1 " })).toBe("cmd-1");
    expect(readCommandId({ "x-command-id": "   " })).toBeUndefined();
    expect(readCommandId({})).toBeUndefined();
  });
});

describe("runIdempotentCommand()", () => {
  it("runs every time without a command id", async () => {
    const commands = new MemoryCommandStore();
    const execute = vi.fn(async () => ({ ok: true }));
    const base = { commands, userId: "u-1", route: "POST /x", payload: {}, now, execute };

    await runIdempotentCommand(base);
    await runIdempotentCommand(base);

    expect(execute).toHaveBeenCalledTimes(2);
  });

  it("replays the stored body for a repeated command", async () => {
    const commands = new MemoryCommandStore();
    let calls = 0;
    const execute = async () => {
      calls += 1;
      return { applicationId: "APP-1", call: calls };
    };
    const base = { commands, commandId: "cmd-1", userId: "u-1", route: "POST /x", payload: { a: 1 }, now };

    const first = await runIdempotentCommand({ ...base, execute });
    const second = await runIdempotentCommand({ ...base, execute });

    expect(first).toEqual({ applicationId: "APP-1", call: 1 });
    expect(second).toEqual({ applicationId: "APP-1", call: 1 });
    expect(calls).toBe(1);
  });

  it("rejects a reused command id with a different payload", async () => {
    const commands = new MemoryCommandStore();
    const execute = async () => ({ ok: true });
    const base = { commands, commandId: "cmd-1", userId: "u-1", route: "POST /x", now, execute };

    await runIdempotentCommand({ ...base, payload: { a: 1 } });
    const attempt = runIdempotentCommand({ ...base, payload: { a: 2 } });

    await expect(attempt).rejects.toBeInstanceOf(HttpError);
    await expect(runIdempotentCommand({ ...base, payload: { a: 2 } })).rejects.toMatchObject({
      statusCode: 409,
      code: "CONFLICT",
    });
  });

  it("keeps command ids separate per user and route", async () => {
    const commands = new MemoryCommandStore();
    const execute = vi.fn(async () => ({ ok: true }));
    const base = { commands, commandId: "cmd-1", payload: {}, now, execute };

    await runIdempotentCommand({ ...base, userId: "u-1", route: "POST /x" });
    await runIdempotentCommand({ ...base, userId: "u-2", route: "POST /x" });
    await runIdempotentCommand({ ...base, userId: "u-1", route: "POST /y" });

    expect(execute).toHaveBeenCalledTimes(3);
  });

  it("does not store anything when the command fails", async () => {
    const commands = new MemoryCommandStore();
    const base = { commands, commandId: "cmd-1", userId: "u-1", route: "POST /x", payload: {}, now };

    await expect(
      runIdempotentCommand({
        ...base,
        execute: async () => {
          throw new HttpError(409, "nope");
        },
      }),
    ).rejects.toThrow("nope");
    expect(await commands.find("cmd-1", "u-1", "POST /x")).toBeNull();
  });

  it("runs concurrent requests with the same command id once", async () => {
    const commands = new MemoryCommandStore();
    let finish: (body: { ok: boolean }) => void = () => undefined;
    const execute = vi.fn(
      () =>
        new Promise<{ ok: boolean }>((resolve) => {
          finish = resolve;
        }),
    );
    const base = { commands, commandId: "cmd-1", userId: "u-1", route: "POST /x", payload: { a: 1 }, now, execute };

    const first = runIdempotentCommand(base);
    await expect(runIdempotentCommand(base)).rejects.toMatchObject({
      statusCode: 409,
      code: "CONFLICT",
      message: "Command with this ID is still in progress",
    });
    finish({ ok: true });

    expect(await first).toEqual({ ok: true });
    expect(await runIdempotentCommand(base)).toEqual({ ok: true });
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("lets a failed command run again under the same id", async () => {
    const commands = new MemoryCommandStore();
    const base = { commands, commandId: "cmd-1", userId: "u-1", route: "POST /x", payload: {}, now };

    await expect(
      runIdempotentCommand({
        ...base,
        execute: async () => {
          throw new Error("store down");
        },
      }),
    ).rejects.toThrow("store down");

    expect(await runIdempotentCommand({ ...base, execute: async () => ({ ok: true }) })).toEqual({ ok: true });
    expect(await commands.find("cmd-1", "u-1", "POST /x")).toMatchObject({
      state: "completed",
      responseBody: { ok: true },
    });
  });
});
