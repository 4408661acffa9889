import crypto from "node:crypto";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { env } from "../config/env.js";
import { AUTH_COOKIE_NAME } from "../plugins/auth.js";
import { HttpError } from "../utils/errors.js";

export const CSRF_HEADER = "x-csrf-token";
export const CSRF_COOKIE = "scholarship_csrf";
const MUTATING_METHODS = new Set(["POST", "PUT", "DELETE", "PATCH"]);

function generateCsrfToken(): string {
  return crypto.randomBytes(32).toString("hex");
}

export function registerCsrfRoutes(app: FastifyInstance) {
  app.get("/v1/auth/csrf-token", async (_request: FastifyRequest, reply: FastifyReply) => {
    const token = generateCsrfToken();
    reply.setCookie(CSRF_COOKIE, token, {
      httpOnly: true,
      secure: env.NODE_ENV === "production",
      sameSite: "strict",
      path: "/",
      maxAge: 8 * 60 * 60,
    });
    return { csrfToken: token };
  });
}

/**
 * Double-submit check for browser sessions. Only requests authenticated by
 * the session cookie are checked; bearer-token clients send no ambient
 * credentials.
 */
export async function csrfGuard(request: FastifyRequest, _reply: FastifyReply) {
  if (!MUTATING_METHODS.has(request.method)) return;
  if (!request.cookies[AUTH_COOKIE_NAME]) return;

  const rawHeader = request.headers[CSRF_HEADER];
  const headerToken = Array.isArray(rawHeader) ? rawHeader[0] : rawHeader;
  const cookieToken = request.cookies[CSRF_COOKIE];

  if (!headerToken || !cookieToken) {
    throw new HttpError(403, "CSRF token missing");
  }

  // Constant-time comparison
  if (headerToken.length !== cookieToken.length) {
    throw new HttpError(403, "CSRF token mismatch");
  }
  if (!crypto.timingSafeEqual(Buffer.from(headerToken), Buffer.from(cookieToken))) {
    throw new HttpError(403, "CSRF token mismatch");
  }
}
