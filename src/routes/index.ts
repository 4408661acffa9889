import type { FastifyInstance } from "fastify";
import { applicationRoutes } from "../modules/applications/index.js";
import { departmentRoutes } from "../modules/department/index.js";
import { disbursementRoutes } from "../modules/disbursements/index.js";
import { financeRoutes } from "../modules/finance/index.js";
import { instituteRoutes } from "../modules/institute/index.js";

const ROUTE_REGISTRARS = [
  applicationRoutes,
  instituteRoutes,
  departmentRoutes,
  financeRoutes,
  disbursementRoutes,
] as const;

export async function registerApiRoutes(app: FastifyInstance) {
  for (const register of ROUTE_REGISTRARS) {
    await app.register(register);
  }
}
