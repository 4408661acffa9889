import { describe, it, expect } from "vitest";
import { authorize } from "../rbac.js";
import { HttpError } from "../errors.js";
import type { AuthUser } from "../../types.js";

function makeUser(role: AuthUser["role"]): AuthUser {
  return { userId: "test-user", role };
}

describe("authorize()", () => {
  it("lets students file and submit their applications", () => {
    const user = makeUser("student");
    expect(() => authorize(user, "create", "application")).not.toThrow();
    expect(() => authorize(user, "submit", "application")).not.toThrow();
    expect(() => authorize(user, "read", "decision_log")).not.toThrow();
  });

  it("blocks students from reviewing or touching disbursements", () => {
    const user = makeUser("student");
    expect(() => authorize(user, "review", "application")).toThrow(HttpError);
    expect(() => authorize(user, "read", "disbursement")).toThrow(HttpError);
  });

  it("keeps institute review and department approval apart", () => {
    expect(() => authorize(makeUser("institute_admin"), "review", "application")).not.toThrow();
    expect(() => authorize(makeUser("institute_admin"), "approve", "application")).toThrow(HttpError);
    expect(() => authorize(makeUser("department_admin"), "approve", "application")).not.toThrow();
    expect(() => authorize(makeUser("department_admin"), "forward", "application")).not.toThrow();
    expect(() => authorize(makeUser("department_admin"), "review", "application")).toThrow(HttpError);
  });

  it("reserves transfers for finance", () => {
    expect(() => authorize(makeUser("finance_admin"), "execute", "disbursement")).not.toThrow();
    expect(() => authorize(makeUser("finance_admin"), "complete", "application")).not.toThrow();
    expect(() => authorize(makeUser("department_admin"), "execute", "disbursement")).toThrow(HttpError);
  });

  it("lets department admins preview but not apply calculations", () => {
    const user = makeUser("department_admin");
    expect(() => authorize(user, "read", "calculation")).not.toThrow();
    expect(() => authorize(user, "update", "calculation")).toThrow(HttpError);
  });

  it("throws HttpError with 403 status code on denial", () => {
    try {
      authorize(makeUser("student"), "forward", "application");
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(HttpError);
      expect(err).toMatchObject({ statusCode: 403, code: "FORBIDDEN" });
      expect((err as HttpError).message).toBe("Role student is not allowed to forward application");
    }
  });
});
