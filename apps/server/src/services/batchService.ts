import type { Logger } from "pino";
import type { BatchInput, BatchRecord } from "../types/batch.js";
import { BatchNotFoundError, DuplicateBatchNameError } from "./errors.js";
import type { RecordStore } from "./recordStore.js";

export class BatchService {
  constructor(
    private readonly store: RecordStore,
    private readonly logger: Logger
  ) {}

  async createBatch(input: BatchInput): Promise<BatchRecord> {
    const existing = await this.store.getBatchByName(input.batchName);
    if (existing) throw new DuplicateBatchNameError(input.batchName);

    const batch = await this.store.createBatch(input);
    this.logger.info({ batchId: batch.id, batchName: batch.batchName, recordType: batch.recordType }, "Batch created");
    return batch;
  }

  async getBatch(batchId: number): Promise<BatchRecord> {
    const batch = await this.store.getBatch(batchId);
    if (!batch) throw new BatchNotFoundError(batchId);
    return batch;
  }

  async listBatches(): Promise<BatchRecord[]> {
    return this.store.listBatches();
  }

  async deleteBatch(batchId: number): Promise<void> {
    const deleted = await this.store.deleteBatch(batchId);
    if (!deleted) throw new BatchNotFoundError(batchId);
    this.logger.info({ batchId }, "Batch deleted");
  }
}
