import type { BatchInput, BatchRecord, RecordStatus, TrackedRecord, TrackedRecordInput } from "../types/batch.js";
import { BatchNotFoundError, DuplicateBatchNameError } from "./errors.js";
import type { RecordStore } from "./recordStore.js";

/**
 * Process-local store with the same constraints as the Postgres schema:
 * unique batch names, record rows bound to an existing batch, cascade on delete.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly batches = new Map<number, BatchRecord>();
  private readonly records = new Map<number, TrackedRecord[]>();
  private nextBatchId = 1;
  private nextRecordId = 1;

  async createBatch(input: BatchInput): Promise<BatchRecord> {
    if (await this.getBatchByName(input.batchName)) {
      throw new DuplicateBatchNameError(input.batchName);
    }
    const batch: BatchRecord = {
      id: this.nextBatchId++,
      batchName: input.batchName,
      recordType: input.recordType,
      description: input.description ?? null,
      createdAt: new Date().toISOString()
    };
    this.batches.set(batch.id, batch);
    this.records.set(batch.id, []);
    return batch;
  }

  async getBatch(batchId: number): Promise<BatchRecord | null> {
    return this.batches.get(batchId) ?? null;
  }

  async getBatchByName(batchName: string): Promise<BatchRecord | null> {
    for (const batch of this.batches.values()) {
      if (batch.batchName === batchName) return batch;
    }
    return null;
  }

  async listBatches(): Promise<BatchRecord[]> {
    return Array.from(this.batches.values()).sort((a, b) => a.id - b.id);
  }

  async deleteBatch(batchId: number): Promise<boolean> {
    this.records.delete(batchId);
    return this.batches.delete(batchId);
  }

  async clearAll(): Promise<{ batches: number; records: number }> {
    let records = 0;
    for (const rows of this.records.values()) records += rows.length;
    const batches = this.batches.size;
    this.batches.clear();
    this.records.clear();
    return { batches, records };
  }

  async insertRecord(batchId: number, input: TrackedRecordInput): Promise<TrackedRecord> {
    const [record] = await this.insertRecords(batchId, [input]);
    return record;
  }

  async insertRecords(batchId: number, inputs: TrackedRecordInput[]): Promise<TrackedRecord[]> {
    const rows = this.rowsFor(batchId);
    const now = new Date().toISOString();
    const created = inputs.map((input) => ({
      id: this.nextRecordId++,
      batchId,
      recordId: input.recordId,
      status: input.status,
      recordMetadata: input.recordMetadata ?? null,
      createdAt: now
    }));
    rows.push(...created);
    return created;
  }

  async listRecords(batchId: number, status?: RecordStatus): Promise<TrackedRecord[]> {
    const rows = this.records.get(batchId) ?? [];
    return status ? rows.filter((row) => row.status === status) : [...rows];
  }

  async fetchIds(batchId: number, status: RecordStatus): Promise<number[]> {
    const rows = await this.listRecords(batchId, status);
    return rows.map((row) => row.recordId).sort((a, b) => a - b);
  }

  async countRecords(batchId: number, status?: RecordStatus): Promise<number> {
    const rows = await this.listRecords(batchId, status);
    return rows.length;
  }

  async clearRecords(batchId: number): Promise<number> {
    const rows = this.records.get(batchId);
    if (!rows) return 0;
    const count = rows.length;
    this.records.set(batchId, []);
    return count;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  private rowsFor(batchId: number): TrackedRecord[] {
    const rows = this.records.get(batchId);
    if (!rows) throw new BatchNotFoundError(batchId);
    return rows;
  }
}
