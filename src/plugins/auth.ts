import fp from "fastify-plugin";
import jwt from "@fastify/jwt";
import cookie from "@fastify/cookie";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { roles } from "../utils/constants.js";
import { HttpError } from "../utils/errors.js";

export const AUTH_COOKIE_NAME = "scholarship_token";

const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(roles),
  instituteId: z.string().min(1).optional(),
  departmentId: z.string().min(1).optional(),
  studentId: z.string().min(1).optional(),
});

interface AuthPluginOptions {
  secret: string;
}

async function authPlugin(app: FastifyInstance, options: AuthPluginOptions) {
  await app.register(jwt, {
    secret: options.secret,
  });

  await app.register(cookie);

  app.decorate("authenticate", async function authenticate(request: FastifyRequest, _reply: FastifyReply) {
    // Cookie first, then the Authorization header
    const cookieToken = request.cookies[AUTH_COOKIE_NAME];
    const authHeader = request.headers.authorization;
    const headerToken = authHeader?.startsWith("Bearer ") ? authHeader.slice(7) : undefined;
    const token = cookieToken || headerToken;

    if (!token) {
      throw new HttpError(401, "Unauthorized");
    }

    let decoded: unknown;
    try {
      decoded = app.jwt.verify(token);
    } catch {
      throw new HttpError(401, "Unauthorized");
    }

    const payload = tokenPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      throw new HttpError(401, "Token payload is not a recognised user");
    }
    request.authUser = payload.data;
  });
}

export default fp(authPlugin, { name: "auth" });
