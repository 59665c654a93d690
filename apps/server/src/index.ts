import pino from "pino";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { createRecordStore } from "./services/createRecordStore.js";
import { runStartupDependencyChecks } from "./services/startupDependencyChecks.js";

const logger = pino({ level: env.LOG_LEVEL });
const store = createRecordStore(env);

await runStartupDependencyChecks(store, logger);

const app = createApp({
  store,
  logger,
  corsOrigin: env.CORS_ORIGIN,
  maxBulkRecords: env.BULK_MAX_RECORDS
});

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, recordStore: env.RECORD_STORE }, "Reconciliation API listening");
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, "Shutting down");
  server.close(() => {
    store
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "Record store close failed");
        process.exit(1);
      });
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
