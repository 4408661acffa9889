import { HttpError } from "./errors.js";
import type { AuthUser } from "../types.js";
import type { Role } from "./constants.js";

export type ResourceKind = "application" | "decision_log" | "disbursement" | "calculation";

export type Action =
  | "create"
  | "read"
  | "submit"
  | "review"
  | "approve"
  | "transition"
  | "forward"
  | "execute"
  | "update"
  | "complete";

const rolePolicies: Record<Role, Record<ResourceKind, Action[]>> = {
  admin: {
    application: ["create", "read", "submit", "review", "approve", "transition", "forward", "complete"],
    decision_log: ["read"],
    disbursement: ["create", "read", "execute", "update"],
    calculation: ["read", "execute", "update"],
  },
  student: {
    application: ["create", "read", "submit"],
    decision_log: ["read"],
    disbursement: [],
    calculation: [],
  },
  institute_admin: {
    application: ["read", "review", "transition"],
    decision_log: ["read"],
    disbursement: [],
    calculation: [],
  },
  department_admin: {
    application: ["read", "approve", "forward"],
    decision_log: ["read"],
    disbursement: [],
    calculation: ["read"],
  },
  finance_admin: {
    application: ["read", "complete"],
    decision_log: ["read"],
    disbursement: ["create", "read", "execute", "update"],
    calculation: ["read", "execute", "update"],
  },
};

export function authorize(user: AuthUser, action: Action, resource: ResourceKind) {
  const allowed = rolePolicies[user.role]?.[resource] ?? [];
  if (!allowed.includes(action)) {
    throw new HttpError(403, `Role ${user.role} is not allowed to ${action} ${resource}`);
  }
}
