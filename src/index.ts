import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";

const config = loadRuntimeConfig();
const app = buildApp(config);

const shutdown = (signal: string): void => {
  app.log.info({ signal }, "Shutting down payment service");
  app
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      app.log.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
};

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

app
  .listen({ port: config.port, host: config.host })
  .then((address) => {
    app.log.info({ address, store: config.storeBackend, idempotency: config.idempotencyBackend }, `${config.serviceName} ready`);
  })
  .catch((error: unknown) => {
    app.log.error({ err: error }, "Failed to start payment service");
    process.exit(1);
  });
