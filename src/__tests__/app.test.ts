import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { buildApp } from "../app.js";
import type { AuthUser } from "../types.js";
import { FIXED_NOW, forwardedToFinance, instituteApproved, makeApplication, users } from "../test/fixtures.js";
import { ScriptedTransferGateway } from "../test/gateways.js";
import { createMemoryStores } from "../test/memory-store.js";

const stores = createMemoryStores();
let app: FastifyInstance;

function bearer(user: AuthUser) {
  return { authorization: `Bearer ${app.jwt.sign(user)}` };
}

const newApplication = {
  instituteId: "INST-001",
  departmentId: "DEPT-CS",
  scholarshipType: "need",
  scholarshipName: "District Need Grant",
  requestedAmount: 25000,
};

beforeAll(async () => {
  app = await buildApp({
    stores,
    gateway: new ScriptedTransferGateway(),
    now: () => FIXED_NOW,
    logLevel: "silent",
  });
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

describe("HTTP API", () => {
  it("reports health without authentication", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it("rejects requests without a token", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/applications", payload: newApplication });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ code: "AUTH_FAILED", category: "authorization" });
  });

  it("rejects tokens that do not describe a known user", async () => {
    const token = app.jwt.sign({ userId: "u-x", role: "superuser" });
    const res = await app.inject({
      method: "GET",
      url: "/v1/applications/APP-NOPE",
      headers: { authorization: `Bearer ${token}` },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe("Token payload is not a recognised user");
  });

  it("creates an application for a student", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/applications",
      headers: bearer(users.student),
      payload: { ...newApplication, submit: true },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      studentId: "STU-001",
      status: "submitted",
      requestedAmount: 25000,
      createdAt: FIXED_NOW.toISOString(),
    });
  });

  it("answers malformed bodies with a validation error", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/applications",
      headers: bearer(users.student),
      payload: { ...newApplication, requestedAmount: -5 },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: "VALIDATION_ERROR", category: "validation" });
  });

  it("replays a repeated command and refuses a reused id", async () => {
    const headers = { ...bearer(users.student), "x-command-id": "cmd-create-1" };

    const first = await app.inject({ method: "POST", url: "/v1/applications", headers, payload: newApplication });
    const second = await app.inject({ method: "POST", url: "/v1/applications", headers, payload: newApplication });
    const reused = await app.inject({
      method: "POST",
      url: "/v1/applications",
      headers,
      payload: { ...newApplication, requestedAmount: 26000 },
    });

    expect(first.statusCode).toBe(200);
    expect(second.json().applicationId).toBe(first.json().applicationId);
    expect(reused.statusCode).toBe(409);
    expect(reused.json().code).toBe("CONFLICT");
  });

  it("runs an institute review", async () => {
    const seeded = makeApplication();
    await stores.applications.insertApplication(seeded, []);

    const forbidden = await app.inject({
      method: "POST",
      url: `/v1/institute/applications/${seeded.applicationId}/review`,
      headers: bearer(users.student),
      payload: { action: "approve" },
    });
    expect(forbidden.statusCode).toBe(403);
    expect(forbidden.json().code).toBe("FORBIDDEN");

    const res = await app.inject({
      method: "POST",
      url: `/v1/institute/applications/${seeded.applicationId}/review`,
      headers: bearer(users.instituteAdmin),
      payload: { action: "approve", remarks: "Eligible" },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "approved", approvedAmount: 50000 });

    const log = await app.inject({
      method: "GET",
      url: `/v1/applications/${seeded.applicationId}/decision-log`,
      headers: bearer(users.student),
    });
    expect(log.statusCode).toBe(200);
    expect(log.json().entries.map((entry: { action: string }) => entry.action)).toEqual([
      "start_review",
      "institute_approve",
    ]);
  });

  it("maps precondition failures to 409 with their code", async () => {
    const seeded = makeApplication({ status: "rejected" });
    await stores.applications.insertApplication(seeded, []);

    const res = await app.inject({
      method: "POST",
      url: `/v1/department/applications/${seeded.applicationId}/review`,
      headers: bearer(users.departmentAdmin),
      payload: { action: "dept_approve" },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ code: "NOT_ELIGIBLE", category: "precondition" });
  });

  it("checks the CSRF token on cookie sessions", async () => {
    const seeded = instituteApproved();
    await stores.applications.insertApplication(seeded, []);
    const token = app.jwt.sign(users.departmentAdmin);
    const request = {
      method: "POST" as const,
      url: `/v1/department/applications/${seeded.applicationId}/review`,
      payload: { action: "dept_approve" },
    };

    const missing = await app.inject({ ...request, cookies: { scholarship_token: token } });
    expect(missing.statusCode).toBe(403);
    expect(missing.json().error).toBe("CSRF token missing");

    const csrf = "a".repeat(64);
    const ok = await app.inject({
      ...request,
      cookies: { scholarship_token: token, scholarship_csrf: csrf },
      headers: { "x-csrf-token": csrf },
    });
    expect(ok.statusCode).toBe(200);
    expect(ok.json().decisions.department).toMatchObject({ decided: true, outcome: "approved" });
  });

  it("previews a calculated amount for finance", async () => {
    const seeded = forwardedToFinance({ requestedAmount: 60000, approvedAmount: 50000 });
    await stores.applications.insertApplication(seeded, []);

    const res = await app.inject({
      method: "POST",
      url: `/v1/finance/applications/${seeded.applicationId}/calculate`,
      headers: bearer(users.financeAdmin),
      payload: { strategy: "standard" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      applicationId: seeded.applicationId,
      applied: false,
      calculation: { finalAmount: 55000, breakdown: { tuition: 38500, maintenance: 13750, books: 2750 } },
    });
  });

  it("pays a forwarded application through the gateway", async () => {
    const seeded = forwardedToFinance();
    await stores.applications.insertApplication(seeded, []);

    const res = await app.inject({
      method: "POST",
      url: "/v1/finance/disbursements",
      headers: bearer(users.financeAdmin),
      payload: { applicationId: seeded.applicationId },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ total: 1, processed: 1, failed: 0, totalAmount: 50000 });
    const stored = await stores.applications.findApplication(seeded.applicationId);
    expect(stored?.status).toBe("disbursed");
  });
});
