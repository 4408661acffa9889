import { describe, it, expect } from "vitest";
import {
  FIXED_NOW,
  forwardedToFinance,
  instituteApproved,
  makeApplication,
  makeContext,
  seed,
  users,
} from "../../../test/fixtures.js";
import { applicationStatuses } from "../../../utils/constants.js";
import { isApplicationEdge } from "../../../utils/state-machine.js";
import { departmentReview, forwardToFinance } from "../../department/services/department-review.service.js";
import { reviewApplication } from "../../institute/services/institute-review.service.js";
import { createApplicationSchema } from "../schemas/applications.schemas.js";
import {
  completeApplication,
  createApplication,
  getApplication,
  getDecisionLog,
  submitApplication,
  transitionApplication,
} from "../services/applications.service.js";

const newApplication = {
  instituteId: "INST-001",
  departmentId: "DEPT-CS",
  scholarshipType: "merit",
  scholarshipName: "State Merit Scholarship",
  requestedAmount: 45000,
  studentProfile: { cgpa: 8.1, courseLevel: "undergraduate" },
  bankAccount: { accountNumber: "123456789012", routingCode: "abcd0123456" },
};

describe("createApplication()", () => {
  it("files a draft for the calling student", async () => {
    const { ctx } = makeContext();

    const app = await createApplication(ctx, users.student, createApplicationSchema.parse(newApplication));

    expect(app.applicationId).toMatch(/^APP2025[0-9A-F]{8}$/);
    expect(app).toMatchObject({
      studentId: "STU-001",
      status: "draft",
      approvedAmount: null,
      priority: "medium",
      version: 1,
      daysPending: 0,
      isOverdue: false,
    });
    expect(app.bankAccount).toEqual({ accountNumber: "123456789012", routingCode: "ABCD0123456" });
    expect(await ctx.stores.applications.listDecisionLog(app.applicationId)).toEqual([]);
  });

  it("submits straight away when asked", async () => {
    const { ctx } = makeContext();

    const app = await createApplication(
      ctx,
      users.student,
      createApplicationSchema.parse({ ...newApplication, submit: true }),
    );

    expect(app.status).toBe("submitted");
    expect(app.timestamps.submittedAt).toEqual(FIXED_NOW);
    const log = await ctx.stores.applications.listDecisionLog(app.applicationId);
    expect(log).toHaveLength(1);
    expect(log[0]).toMatchObject({
      sequence: 1,
      stage: "intake",
      action: "submit",
      fromStatus: "draft",
      toStatus: "submitted",
      actorId: "u-student",
      actorRole: "student",
    });
  });

  it("stops students filing for someone else", async () => {
    const { ctx } = makeContext();
    const payload = createApplicationSchema.parse({ ...newApplication, studentId: "STU-999" });

    await expect(createApplication(ctx, users.student, payload)).rejects.toMatchObject({
      statusCode: 403,
      message: "Students may only file their own applications",
    });
  });

  it("needs a student id when staff file", async () => {
    const { ctx } = makeContext();

    await expect(
      createApplication(ctx, users.admin, createApplicationSchema.parse(newApplication)),
    ).rejects.toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("rejects amounts with sub-cent precision", () => {
    const parsed = createApplicationSchema.safeParse({ ...newApplication, requestedAmount: 100.005 });
    expect(parsed.success).toBe(false);
  });
});

describe("submitApplication()", () => {
  it("moves a draft to submitted once", async () => {
    const { ctx } = makeContext();
    const draft = await seed(ctx, makeApplication({ status: "draft" }));

    const submitted = await submitApplication(ctx, users.student, draft.applicationId, { remarks: "" });
    expect(submitted.status).toBe("submitted");
    expect(submitted.version).toBe(2);

    await expect(
      submitApplication(ctx, users.student, draft.applicationId, { remarks: "" }),
    ).rejects.toMatchObject({ code: "INVALID_TRANSITION" });
  });

  it("reports unknown applications", async () => {
    const { ctx } = makeContext();
    await expect(submitApplication(ctx, users.student, "APP-NOPE", { remarks: "" })).rejects.toMatchObject({
      statusCode: 404,
      code: "NOT_FOUND",
    });
  });
});

describe("transitionApplication()", () => {
  it("rejects every move outside the lifecycle and leaves the record alone", async () => {
    const { ctx } = makeContext();

    for (const from of applicationStatuses) {
      for (const to of applicationStatuses) {
        if (isApplicationEdge(from, to)) continue;
        const app = await seed(ctx, makeApplication({ status: from }));

        await expect(
          transitionApplication(ctx, users.admin, app.applicationId, { targetStatus: to, remarks: "" }),
        ).rejects.toMatchObject({ code: "INVALID_TRANSITION" });

        const stored = await ctx.stores.applications.findApplication(app.applicationId);
        expect(stored?.status).toBe(from);
        expect(stored?.version).toBe(1);
      }
    }
  });

  it("keeps guarded edges for their gatekeepers", async () => {
    const { ctx } = makeContext();
    const app = await seed(ctx, instituteApproved());

    for (const targetStatus of ["rejected", "disbursed"] as const) {
      await expect(
        transitionApplication(ctx, users.admin, app.applicationId, { targetStatus, remarks: "" }),
      ).rejects.toMatchObject({ code: "INVALID_TRANSITION" });
    }
  });

  it("logs the move under the caller's stage", async () => {
    const { ctx } = makeContext();
    const app = await seed(ctx, makeApplication({ status: "on_hold" }));

    const moved = await transitionApplication(ctx, users.instituteAdmin, app.applicationId, {
      targetStatus: "under_review",
      remarks: "Documents arrived",
    });

    expect(moved.status).toBe("under_review");
    expect(moved.timestamps.reviewStartedAt).toEqual(FIXED_NOW);
    const [entry] = await ctx.stores.applications.listDecisionLog(app.applicationId);
    expect(entry).toMatchObject({
      stage: "institute",
      action: "transition",
      fromStatus: "on_hold",
      toStatus: "under_review",
      remarks: "Documents arrived",
    });
  });
});

describe("decision log", () => {
  it("replays to the stored stage decisions", async () => {
    const { ctx } = makeContext();
    const app = await seed(ctx, makeApplication({ requestedAmount: 60000 }));

    await reviewApplication(ctx, users.instituteAdmin, app.applicationId, {
      action: "approve",
      remarks: "Eligible",
      approvedAmount: 52000,
    });
    await departmentReview(ctx, users.departmentAdmin, app.applicationId, {
      action: "dept_approve",
      remarks: "Recommended",
      finalAmount: 51000,
    });
    await forwardToFinance(ctx, users.departmentAdmin, {
      applicationIds: [app.applicationId],
      remarks: "Batch 1",
      priority: "high",
    });

    const stored = await ctx.stores.applications.findApplication(app.applicationId);
    const log = await getDecisionLog(ctx, users.student, app.applicationId);

    expect(log.decisions).toEqual(stored?.decisions);
    expect(log.decisions.financeForward).toMatchObject({ forwarded: true, amount: 51000, priority: "high" });
    expect(log.entries.map((entry) => entry.action)).toEqual([
      "start_review",
      "start_eligibility_check",
      "institute_partially_approve",
      "dept_approve",
      "forward_to_finance",
    ]);
  });

  it("only ever appends", async () => {
    const { ctx } = makeContext();
    const app = await seed(ctx, makeApplication());

    await reviewApplication(ctx, users.instituteAdmin, app.applicationId, {
      action: "request_documents",
      remarks: "Need income certificate",
    });
    const before = await ctx.stores.applications.listDecisionLog(app.applicationId);

    await reviewApplication(ctx, users.instituteAdmin, app.applicationId, { action: "approve", remarks: "" });
    const after = await ctx.stores.applications.listDecisionLog(app.applicationId);

    expect(after.slice(0, before.length)).toEqual(before);
    expect(after.map((entry) => entry.sequence)).toEqual(after.map((_, index) => index + 1));
  });

  it("is scoped like the application", async () => {
    const { ctx } = makeContext();
    const app = await seed(ctx, makeApplication());

    await expect(getDecisionLog(ctx, users.otherStudent, app.applicationId)).rejects.toMatchObject({
      statusCode: 403,
    });
  });
});

describe("getApplication()", () => {
  it("reports days pending and overdue against the SLA window", async () => {
    const { ctx, advance } = makeContext();
    const app = await seed(ctx, makeApplication());

    const fresh = await getApplication(ctx, users.instituteAdmin, app.applicationId);
    expect(fresh.application).toMatchObject({ daysPending: 2, isOverdue: false });
    expect(fresh.disbursements).toEqual([]);

    advance(40);
    const late = await getApplication(ctx, users.instituteAdmin, app.applicationId);
    expect(late.application).toMatchObject({ daysPending: 42, isOverdue: true });
  });
});

describe("completeApplication()", () => {
  it("closes a disbursed application", async () => {
    const { ctx } = makeContext();
    const app = await seed(ctx, { ...forwardedToFinance(), status: "disbursed" });

    const completed = await completeApplication(ctx, users.financeAdmin, app.applicationId, { remarks: "Closed" });

    expect(completed.status).toBe("completed");
    expect(completed.timestamps.completedAt).toEqual(FIXED_NOW);
    const [entry] = await ctx.stores.applications.listDecisionLog(app.applicationId);
    expect(entry).toMatchObject({
      stage: "finance",
      action: "complete",
      fromStatus: "disbursed",
      toStatus: "completed",
      amount: 50000,
    });
  });

  it("refuses applications that were never paid", async () => {
    const { ctx } = makeContext();
    const app = await seed(ctx, forwardedToFinance());

    await expect(
      completeApplication(ctx, users.financeAdmin, app.applicationId, { remarks: "" }),
    ).rejects.toMatchObject({ code: "INVALID_TRANSITION" });
  });
});
