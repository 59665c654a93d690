import type { BatchInput, BatchRecord, RecordStatus, TrackedRecord, TrackedRecordInput } from "../types/batch.js";

/**
 * Persistence boundary for batches and their tracked record ids.
 * Reads are snapshots at call time; callers never hold locks.
 */
export interface RecordStore {
  createBatch(input: BatchInput): Promise<BatchRecord>;
  getBatch(batchId: number): Promise<BatchRecord | null>;
  getBatchByName(batchName: string): Promise<BatchRecord | null>;
  listBatches(): Promise<BatchRecord[]>;
  /** Removes the batch and every record that references it. */
  deleteBatch(batchId: number): Promise<boolean>;
  /** Removes every batch and record. Used by the seed script. */
  clearAll(): Promise<{ batches: number; records: number }>;

  insertRecord(batchId: number, input: TrackedRecordInput): Promise<TrackedRecord>;
  insertRecords(batchId: number, inputs: TrackedRecordInput[]): Promise<TrackedRecord[]>;
  listRecords(batchId: number, status?: RecordStatus): Promise<TrackedRecord[]>;
  /** Record ids for one status, ascending, duplicates kept as stored. */
  fetchIds(batchId: number, status: RecordStatus): Promise<number[]>;
  countRecords(batchId: number, status?: RecordStatus): Promise<number>;
  clearRecords(batchId: number): Promise<number>;

  ping(): Promise<void>;
  close(): Promise<void>;
}
