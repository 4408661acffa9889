import { HttpError } from "./errors.js";
import type { AuthUser } from "../types.js";

interface ScopedApplication {
  studentId: string;
  instituteId: string;
  departmentId: string;
}

export function assertApplicationScope(user: AuthUser, application: ScopedApplication) {
  switch (user.role) {
    case "admin":
      return;
    case "student":
      if (!user.studentId || user.studentId !== application.studentId) {
        throw new HttpError(403, "Student out of application scope");
      }
      return;
    case "institute_admin":
      if (!user.instituteId || user.instituteId !== application.instituteId) {
        throw new HttpError(403, "Institute admin out of institute scope");
      }
      return;
    case "department_admin":
      if (!user.departmentId || user.departmentId !== application.departmentId) {
        throw new HttpError(403, "Department admin out of department scope");
      }
      return;
    case "finance_admin":
      // Finance admins without an institute act across institutes
      if (user.instituteId && user.instituteId !== application.instituteId) {
        throw new HttpError(403, "Finance admin out of institute scope");
      }
      return;
  }
}

/** Filter limiting a listing to what `user` may see. */
export function applicationListScope(user: AuthUser): { instituteId?: string; departmentId?: string } {
  switch (user.role) {
    case "admin":
      return {};
    case "institute_admin":
      if (!user.instituteId) throw new HttpError(403, "Institute admin has no institute");
      return { instituteId: user.instituteId };
    case "department_admin":
      if (!user.departmentId) throw new HttpError(403, "Department admin has no department");
      return { departmentId: user.departmentId };
    case "finance_admin":
      return user.instituteId ? { instituteId: user.instituteId } : {};
    case "student":
      throw new HttpError(403, "Students cannot list review queues");
  }
}
