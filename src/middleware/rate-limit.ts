/**
 * Rate limiting.
 *
 * Global limit  : 200 req/min per user (per IP before authentication)
 * Decision routes: tighter per-route limits
 */

import type { FastifyInstance, FastifyRequest } from "fastify";
import rateLimit from "@fastify/rate-limit";

interface RouteLimit {
  max: number;
  timeWindow: string;
}

const ROUTE_RATE_LIMITS: Record<string, RouteLimit> = {
  "/v1/institute/applications/:id/review": { max: 60, timeWindow: "1 minute" },
  "/v1/institute/applications/bulk-review": { max: 10, timeWindow: "1 minute" },
  "/v1/department/applications/:id/review": { max: 60, timeWindow: "1 minute" },
  "/v1/department/forward": { max: 10, timeWindow: "1 minute" },
  "/v1/finance/disbursements": { max: 10, timeWindow: "1 minute" },
  "/v1/finance/disbursements/transfer": { max: 10, timeWindow: "1 minute" },
  "/v1/finance/disbursements/:id/transfer": { max: 30, timeWindow: "1 minute" },
};

function clientKey(request: FastifyRequest): string {
  if (request.authUser?.userId) return request.authUser.userId;
  const xff = request.headers["x-forwarded-for"];
  return (Array.isArray(xff) ? xff[0] : xff?.split(",")[0]) ?? request.ip;
}

export async function registerRateLimit(app: FastifyInstance): Promise<void> {
  await app.register(rateLimit, {
    global: true,
    max: 200,
    timeWindow: "1 minute",
    keyGenerator: clientKey,
    errorResponseBuilder: (_request, context) => ({
      statusCode: context.statusCode,
      error: `Rate limit exceeded. Retry after ${context.after}.`,
      code: "RATE_LIMITED",
      category: "validation",
    }),
  });

  app.addHook("onRoute", (routeOptions) => {
    const routeLimit = ROUTE_RATE_LIMITS[routeOptions.url];
    if (routeLimit && routeOptions.method !== "GET") {
      routeOptions.config = { ...routeOptions.config, rateLimit: routeLimit };
    }
  });
}
