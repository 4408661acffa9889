import type { FastifyReply, FastifyRequest } from "fastify";
import type { EngineContext } from "./context.js";
import type { AuthUser } from "./types.js";

declare module "fastify" {
  interface FastifyRequest {
    authUser: AuthUser;
  }

  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    engine: EngineContext;
  }
}
