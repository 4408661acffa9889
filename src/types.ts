import type { Role } from "./utils/constants.js";

export interface AuthUser {
  userId: string;
  role: Role;
  instituteId?: string;
  departmentId?: string;
  studentId?: string;
}

export interface LoggerLike {
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
}
