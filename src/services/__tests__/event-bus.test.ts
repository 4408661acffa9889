import { EventEmitter } from "node:events";
import { describe, it, expect } from "vitest";
import { recordingLogger } from "../../test/fixtures.js";
import { emitEngineEvent, onEngineEvent } from "../event-bus.js";

describe("engine events", () => {
  it("delivers payloads to subscribers until they unsubscribe", () => {
    const bus = new EventEmitter();
    const received: string[] = [];
    const off = onEngineEvent(bus, "application.forwarded", (payload) => {
      received.push(`${payload.applicationId}:${payload.batchId}`);
    });

    emitEngineEvent(bus, recordingLogger(), "application.forwarded", {
      applicationId: "APP-1",
      batchId: "FWD-1",
      amount: 1000,
    });
    off();
    emitEngineEvent(bus, recordingLogger(), "application.forwarded", {
      applicationId: "APP-2",
      batchId: "FWD-1",
      amount: 1000,
    });

    expect(received).toEqual(["APP-1:FWD-1"]);
  });

  it("logs a failing listener instead of throwing", () => {
    const bus = new EventEmitter();
    const log = recordingLogger();
    onEngineEvent(bus, "disbursement.failed", () => {
      throw new Error("mailer down");
    });

    expect(() =>
      emitEngineEvent(bus, log, "disbursement.failed", {
        applicationId: "APP-1",
        disbursementId: "DSB-1",
        reason: "Account closed",
      }),
    ).not.toThrow();
    expect(log.lines).toHaveLength(1);
    expect(log.lines[0]).toMatchObject({
      level: "error",
      msg: "Engine event listener failed",
      obj: { event: "disbursement.failed" },
    });
  });
});
