import { buildApp } from "./app.js";
import { env } from "./config/env.js";
import { connectMongo, disconnectMongo } from "./db/mongo.js";
import { createMongoStores } from "./db/mongo-store.js";
import { engineEventNames, eventBus, onEngineEvent } from "./services/event-bus.js";
import { createTransferGateway } from "./services/transfer-gateway.js";

async function start() {
  const app = await buildApp({
    stores: (log) => createMongoStores({ maxConflictRetries: env.STORE_MAX_CONFLICT_RETRIES, log }),
    gateway: createTransferGateway(env),
    events: eventBus,
  });
  await connectMongo(app.log);

  // Notification and reporting consumers attach here; until then events are logged.
  const unsubscribers = engineEventNames.map((name) =>
    onEngineEvent(eventBus, name, (payload) => {
      app.log.info({ event: name, ...payload }, "Engine event");
    }),
  );

  if (!env.TRANSFER_GATEWAY_URL) {
    app.log.warn("TRANSFER_GATEWAY_URL is not set; bank transfers will fail until it is configured");
  }

  const close = async (signal: string) => {
    app.log.info(`Shutting down (${signal})`);
    for (const unsubscribe of unsubscribers) unsubscribe();
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void close("SIGINT");
  });

  process.on("SIGTERM", () => {
    void close("SIGTERM");
  });

  await app.listen({
    port: env.PORT,
    host: "0.0.0.0",
  });

  app.log.info(`API listening on ${env.PORT}`);
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
