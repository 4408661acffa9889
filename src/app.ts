import { EventEmitter } from "node:events";
import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import helmet from "@fastify/helmet";
import { ZodError } from "zod";
import authPlugin from "./plugins/auth.js";
import { HttpError } from "./utils/errors.js";
import { registerApiRoutes } from "./routes/index.js";
import { registerRateLimit } from "./middleware/rate-limit.js";
import { registerRequestLogger } from "./middleware/request-logger.js";
import { csrfGuard, registerCsrfRoutes } from "./middleware/csrf.js";
import { env } from "./config/env.js";
import type { EngineContext, EngineSettings } from "./context.js";
import type { Stores } from "./db/store.js";
import type { TransferGateway } from "./services/transfer-gateway.js";
import type { LoggerLike } from "./types.js";

export interface BuildAppOptions {
  /** Stores, or a factory that receives the app logger. */
  stores: Stores | ((log: LoggerLike) => Stores);
  gateway: TransferGateway;
  events?: EventEmitter;
  now?: () => Date;
  settings?: Partial<EngineSettings>;
  /** Defaults to `debug` outside production and `info` in production. */
  logLevel?: string;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    },
  });

  const engine: EngineContext = {
    stores: typeof options.stores === "function" ? options.stores(app.log) : options.stores,
    gateway: options.gateway,
    events: options.events ?? new EventEmitter(),
    log: app.log,
    now: options.now ?? (() => new Date()),
    settings: {
      slaDays: options.settings?.slaDays ?? env.APPLICATION_SLA_DAYS,
      enforceAmountCeiling: options.settings?.enforceAmountCeiling ?? env.ENFORCE_APPROVED_AMOUNT_CEILING,
    },
  };
  app.decorate("engine", engine);

  await app.register(cors, {
    origin: env.ALLOWED_ORIGINS.split(",").map((o) => o.trim()),
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
      },
    },
    frameguard: { action: "deny" },
    referrerPolicy: { policy: "strict-origin-when-cross-origin" },
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Scholarship Lifecycle API",
        version: "0.1.0",
        description: "Three-stage scholarship review, decision ledger, amount calculation and disbursement",
      },
      servers: [{ url: "/", description: "Local" }],
      tags: [
        { name: "applications" },
        { name: "institute" },
        { name: "department" },
        { name: "finance" },
        { name: "disbursements" },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: "/docs",
  });

  await registerRateLimit(app);

  await app.register(authPlugin, { secret: env.JWT_SECRET });

  await registerRequestLogger(app);

  registerCsrfRoutes(app);
  app.addHook("preHandler", csrfGuard);

  app.get("/health", async () => ({ ok: true }));

  await registerApiRoutes(app);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof HttpError) {
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        category: error.category,
        details: error.details,
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: "Validation failed",
        code: "VALIDATION_ERROR",
        category: "validation",
        details: error.flatten(),
      });
    }

    const statusCode = error.statusCode;
    if (statusCode === 429) {
      return reply.status(429).send({ error: "Rate limit exceeded", code: "RATE_LIMITED", category: "validation" });
    }
    if (statusCode && statusCode >= 400 && statusCode < 500) {
      // Framework errors such as malformed JSON bodies
      return reply.status(statusCode).send({ error: error.message, code: "VALIDATION_ERROR", category: "validation" });
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({ error: "Internal Server Error", code: "INTERNAL", category: "internal" });
  });

  return app;
}
