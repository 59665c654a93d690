export const RECORD_TYPES = ["order", "transaction", "file", "shipment", "payment"] as const;
export const RECORD_STATUSES = ["expected", "processed"] as const;

// Ids are stored in Postgres INTEGER columns.
export const RECORD_ID_MIN = -2147483648;
export const RECORD_ID_MAX = 2147483647;

export type RecordType = (typeof RECORD_TYPES)[number];
export type RecordStatus = (typeof RECORD_STATUSES)[number];

export interface BatchInput {
  batchName: string;
  recordType: RecordType;
  description?: string | null;
}

export interface BatchRecord {
  id: number;
  batchName: string;
  recordType: RecordType;
  description: string | null;
  createdAt: string;
}

export interface TrackedRecordInput {
  recordId: number;
  status: RecordStatus;
  recordMetadata?: string | null;
}

/**
 * One stored identifier for a batch. `recordId` is the domain key (order
 * number, file id, ...) and repeats freely across batches.
 */
export interface TrackedRecord {
  id: number;
  batchId: number;
  recordId: number;
  status: RecordStatus;
  recordMetadata: string | null;
  createdAt: string;
}
