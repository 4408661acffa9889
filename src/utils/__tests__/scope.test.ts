import { describe, it, expect } from "vitest";
import { users } from "../../test/fixtures.js";
import { HttpError } from "../errors.js";
import { applicationListScope, assertApplicationScope } from "../scope.js";

const application = { studentId: "STU-001", instituteId: "INST-001", departmentId: "DEPT-CS" };

describe("assertApplicationScope()", () => {
  it("admits each role inside its own scope", () => {
    for (const user of [
      users.admin,
      users.student,
      users.instituteAdmin,
      users.departmentAdmin,
      users.financeAdmin,
    ]) {
      expect(() => assertApplicationScope(user, application)).not.toThrow();
    }
  });

  it("refuses each role outside its scope", () => {
    for (const user of [users.otherStudent, users.otherInstituteAdmin, users.otherDepartmentAdmin]) {
      expect(() => assertApplicationScope(user, application)).toThrow(HttpError);
    }
  });

  it("limits finance admins bound to an institute", () => {
    const bound = { ...users.financeAdmin, instituteId: "INST-999" };
    expect(() => assertApplicationScope(bound, application)).toThrow("Finance admin out of institute scope");
  });

  it("refuses admins with no scope attribute", () => {
    expect(() => assertApplicationScope({ userId: "u", role: "institute_admin" }, application)).toThrow(
      HttpError,
    );
  });
});

describe("applicationListScope()", () => {
  it("narrows listings to the caller's unit", () => {
    expect(applicationListScope(users.admin)).toEqual({});
    expect(applicationListScope(users.instituteAdmin)).toEqual({ instituteId: "INST-001" });
    expect(applicationListScope(users.departmentAdmin)).toEqual({ departmentId: "DEPT-CS" });
    expect(applicationListScope(users.financeAdmin)).toEqual({});
  });

  it("refuses students", () => {
    expect(() => applicationListScope(users.student)).toThrow("Students cannot list review queues");
  });
});
