import { fileURLToPath } from "node:url";
import pino from "pino";
import { env } from "../config/env.js";
import { createRecordStore } from "../services/createRecordStore.js";
import { loadSampleData, readSampleFile } from "../services/sampleDataLoader.js";

const logger = pino({ name: "reconciler-seed", level: env.LOG_LEVEL });
const samplePath = fileURLToPath(new URL("../../data/sample_orders.json", import.meta.url));
const store = createRecordStore(env);

try {
  const sample = await readSampleFile(samplePath);
  const summary = await loadSampleData(store, sample, logger);
  logger.info(
    {
      batchId: summary.batchId,
      totalExpected: summary.totalExpected,
      totalProcessed: summary.totalProcessed,
      missingRecords: summary.missingRecords,
      processingRate: summary.processingRate
    },
    "Database seeded"
  );
  logger.info(`Try GET /api/v1/analysis/missing/${summary.batchId} or /api/v1/analysis/status/${summary.batchId}`);
} catch (error) {
  logger.error({ err: error }, "Seeding failed");
  process.exitCode = 1;
} finally {
  await store.close();
}
