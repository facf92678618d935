import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { makeLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = makeLogger({ ...(config.logLevel ? { level: config.logLevel } : {}) });
const app = buildApp(config, { logger });

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info({ host: config.host, port: config.port, store: config.storeBackend }, "settlement ledger API listening");
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "settlement ledger API failed to start");
    process.exit(1);
  });
