import type { FastifyInstance } from "fastify";

export async function registerRequestLogger(app: FastifyInstance): Promise<void> {
  app.addHook("onResponse", (request, reply, done) => {
    const logData = {
      method: request.method,
      url: request.url,
      // Unset when authentication did not run or failed
      userId: request.authUser?.userId ?? "anonymous",
      statusCode: reply.statusCode,
      duration: Math.round(reply.elapsedTime),
      userAgent: request.headers["user-agent"] ?? "unknown",
    };

    if (request.url === "/health") {
      app.log.debug(logData, "request completed");
    } else if (reply.statusCode >= 400) {
      app.log.warn(logData, "request failed");
    } else {
      app.log.info(logData, "request completed");
    }

    done();
  });
}
