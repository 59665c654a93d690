import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import { z } from "zod";
import { RECORD_ID_MAX, RECORD_ID_MIN, RECORD_STATUSES, RECORD_TYPES } from "../types/batch.js";
import type { MissingRecordsResult } from "../types/reconciliation.js";
import { ReconciliationService } from "./reconciliationService.js";
import type { RecordStore } from "./recordStore.js";

const sampleRecordSchema = z.object({
  recordId: z.number().int().min(RECORD_ID_MIN).max(RECORD_ID_MAX),
  status: z.enum(RECORD_STATUSES),
  recordMetadata: z.string().nullish()
});

const sampleFileSchema = z.object({
  batch: z.object({
    batchName: z.string().min(1).max(255),
    recordType: z.enum(RECORD_TYPES),
    description: z.string().nullish()
  }),
  expectedRecords: z.array(sampleRecordSchema.extend({ status: z.literal("expected") })),
  processedRecords: z.array(sampleRecordSchema.extend({ status: z.literal("processed") }))
});

export type SampleFile = z.infer<typeof sampleFileSchema>;

export async function readSampleFile(path: string): Promise<SampleFile> {
  const raw = await readFile(path, "utf-8");
  return parseSampleFile(JSON.parse(raw));
}

export function parseSampleFile(raw: unknown): SampleFile {
  return sampleFileSchema.parse(raw);
}

/**
 * Replaces everything in the store with one sample batch and returns its
 * reconciliation so the caller can print a summary.
 */
export async function loadSampleData(store: RecordStore, sample: SampleFile, logger: Logger): Promise<MissingRecordsResult> {
  const cleared = await store.clearAll();
  logger.info(cleared, "Cleared existing data");

  const batch = await store.createBatch(sample.batch);
  logger.info({ batchId: batch.id, batchName: batch.batchName }, "Created sample batch");

  const expected = await store.insertRecords(batch.id, sample.expectedRecords);
  const processed = await store.insertRecords(batch.id, sample.processedRecords);
  logger.info({ expected: expected.length, processed: processed.length }, "Loaded sample records");

  return new ReconciliationService(store, logger).reconcile(batch.id);
}
