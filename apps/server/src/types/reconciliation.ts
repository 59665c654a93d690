import type { RecordType } from "./batch.js";

export interface ReconciliationSummary {
  totalExpected: number;
  totalProcessed: number;
  successfulCount: number;
  missingCount: number;
  missingRecords: number[];
  unexpectedCount: number;
  unexpectedRecords: number[];
  processingRate: number;
}

export interface MissingRecordsResult {
  batchId: number;
  batchName: string;
  totalExpected: number;
  totalProcessed: number;
  missingCount: number;
  missingRecords: number[];
  processingRate: number;
  unexpectedCount: number;
  unexpectedRecords: number[];
}

export interface ProcessingStatusResult {
  batchId: number;
  batchName: string;
  recordType: RecordType;
  expectedRecords: number[];
  processedRecords: number[];
  expectedCount: number;
  processedCount: number;
}

export interface BatchStatistics {
  batchId: number;
  batchName: string;
  totalRecords: number;
  expectedCount: number;
  processedCount: number;
  totalExpected: number;
  totalProcessed: number;
  missingCount: number;
  unexpectedCount: number;
  processingRate: number;
}
