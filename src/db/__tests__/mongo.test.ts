import { describe, it, expect } from "vitest";
import { recordingLogger } from "../../test/fixtures.js";
import { prepareCollections, type IndexedModel } from "../mongo.js";

function fakeModel(modelName: string, dropped: string[], calls: string[]): IndexedModel {
  return {
    modelName,
    createCollection: async () => {
      calls.push(`create:${modelName}`);
    },
    syncIndexes: async () => {
      calls.push(`sync:${modelName}`);
      return dropped;
    },
  };
}

describe("prepareCollections()", () => {
  it("creates each collection before syncing its indexes", async () => {
    const calls: string[] = [];
    const log = recordingLogger();

    await prepareCollections(log, [fakeModel("Application", [], calls), fakeModel("Disbursement", [], calls)]);

    expect(calls).toEqual(["create:Application", "sync:Application", "create:Disbursement", "sync:Disbursement"]);
    expect(log.lines).toEqual([
      { level: "info", obj: { models: ["Application", "Disbursement"] }, msg: "Collections and indexes ready" },
    ]);
  });

  it("warns about indexes it dropped", async () => {
    const log = recordingLogger();

    await prepareCollections(log, [fakeModel("Disbursement", ["applicationId_1"], [])]);

    expect(log.lines[0]).toEqual({
      level: "warn",
      obj: { model: "Disbursement", dropped: ["applicationId_1"] },
      msg: "Dropped indexes no longer declared on the model",
    });
  });
});
