import type { Logger } from "pino";
import { env } from "../config/env.js";
import type { RecordStore } from "./recordStore.js";

/**
 * Fail fast when the record store is unreachable instead of answering every
 * request with a 500.
 */
export async function runStartupDependencyChecks(store: RecordStore, logger: Logger): Promise<void> {
  try {
    await store.ping();
    logger.info({ recordStore: env.RECORD_STORE }, "Startup dependency check passed");
  } catch (error) {
    logger.fatal({ recordStore: env.RECORD_STORE, err: error }, "Startup dependency check failed");
    throw new Error(`record_store_unreachable:${env.RECORD_STORE}`);
  }
  if (env.RECORD_STORE === "memory" && env.NODE_ENV === "production") {
    logger.warn("Memory record store selected in production; data will not survive a restart");
  }
}
