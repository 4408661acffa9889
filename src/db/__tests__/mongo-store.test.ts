import { describe, it, expect } from "vitest";
import type { DisbursementRecord } from "../records.js";
import { FIXED_NOW, forwardedToFinance, makeApplication } from "../../test/fixtures.js";
import {
  applicationFromDoc,
  applicationToDoc,
  disbursementFromDoc,
  disbursementToDoc,
  filterToQuery,
  sortFor,
} from "../mongo-store.js";

function disbursement(overrides: Partial<DisbursementRecord> = {}): DisbursementRecord {
  return {
    disbursementId: "DSB20250310AAAA0001",
    applicationId: "APPTEST0001",
    amount: 45250.5,
    method: "bank_transfer",
    status: "pending",
    bankAccount: { accountNumber: "123456789012", routingCode: "ABCD0123456" },
    transactionReference: null,
    failureReason: null,
    batchId: null,
    attempts: 0,
    disbursedAt: null,
    remarks: ["Created from forward batch"],
    createdBy: "u-fin",
    version: 1,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
    ...overrides,
  };
}

describe("application mapping", () => {
  it("stores amounts as Decimal128 with two places", () => {
    const doc = applicationToDoc(makeApplication({ requestedAmount: 1234.5, approvedAmount: 1000 }));
    expect(doc.requestedAmount.toString()).toBe("1234.50");
    expect(doc.approvedAmount?.toString()).toBe("1000.00");
  });

  it("reads back what it wrote for a fresh application", () => {
    const record = makeApplication();
    expect(applicationFromDoc(applicationToDoc(record))).toEqual(record);
  });

  it("reads back stage decisions and the finance forward", () => {
    const record = forwardedToFinance({ requestedAmount: 60000, approvedAmount: 55000.25 });
    const restored = applicationFromDoc(applicationToDoc(record));
    expect(restored).toEqual(record);
    expect(restored.decisions.financeForward).toMatchObject({ forwarded: true, amount: 55000.25 });
  });

  it("writes undecided stages as empty slots", () => {
    const doc = applicationToDoc(makeApplication());
    expect(doc.decisions.department).toEqual({
      decided: false,
      outcome: null,
      actorId: null,
      remarks: null,
      amount: null,
      decidedAt: null,
    });
  });
});

describe("disbursement mapping", () => {
  it("marks live disbursements against their application", () => {
    expect(disbursementToDoc(disbursement()).activeApplicationId).toBe("APPTEST0001");
    expect(disbursementToDoc(disbursement({ status: "failed" })).activeApplicationId).toBe("APPTEST0001");
  });

  it("releases the slot once cancelled", () => {
    expect(disbursementToDoc(disbursement({ status: "cancelled" })).activeApplicationId).toBeNull();
  });

  it("reads back what it wrote", () => {
    const record = disbursement({
      status: "disbursed",
      transactionReference: "TXN-1",
      attempts: 2,
      disbursedAt: FIXED_NOW,
      version: 4,
    });
    expect(disbursementFromDoc(disbursementToDoc(record))).toEqual(record);
  });
});

describe("filterToQuery()", () => {
  it("returns an empty query for an empty filter", () => {
    expect(filterToQuery({})).toEqual({});
  });

  it("maps status, scope and decision flags", () => {
    expect(
      filterToQuery({
        statuses: ["approved", "partially_approved"],
        departmentId: "DEPT-CS",
        instituteApproved: true,
        departmentDecided: false,
        forwarded: false,
      }),
    ).toEqual({
      status: { $in: ["approved", "partially_approved"] },
      departmentId: "DEPT-CS",
      $and: [
        { "decisions.institute.decided": true, "decisions.institute.outcome": "approved" },
        { "decisions.department.decided": false },
        { "decisions.financeForward.forwarded": false },
      ],
    });
  });

  it("negates approval flags with $nor", () => {
    expect(filterToQuery({ departmentApproved: false })).toEqual({
      $and: [
        { $nor: [{ "decisions.department.decided": true, "decisions.department.outcome": "approved" }] },
      ],
    });
  });
});

describe("queue queries", () => {
  it("filters on priority", () => {
    expect(filterToQuery({ priority: "urgent", forwarded: true })).toEqual({
      priority: "urgent",
      $and: [{ "decisions.financeForward.forwarded": true }],
    });
  });

  it("breaks every sort tie by age and id", () => {
    expect(sortFor("oldest")).toEqual({ createdAt: 1, applicationId: 1 });
    expect(sortFor("newest")).toEqual({ createdAt: -1, applicationId: 1 });
    expect(sortFor("largest")).toEqual({ requestedAmount: -1, createdAt: 1, applicationId: 1 });
  });
});
