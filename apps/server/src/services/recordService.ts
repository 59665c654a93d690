import type { Logger } from "pino";
import type { RecordStatus, TrackedRecord, TrackedRecordInput } from "../types/batch.js";
import { BatchNotFoundError } from "./errors.js";
import type { RecordStore } from "./recordStore.js";

export class RecordService {
  constructor(
    private readonly store: RecordStore,
    private readonly logger: Logger
  ) {}

  async createRecord(batchId: number, input: TrackedRecordInput): Promise<TrackedRecord> {
    await this.requireBatch(batchId);
    return this.store.insertRecord(batchId, input);
  }

  async bulkCreateRecords(batchId: number, inputs: TrackedRecordInput[]): Promise<TrackedRecord[]> {
    await this.requireBatch(batchId);
    const created = await this.store.insertRecords(batchId, inputs);
    this.logger.info({ batchId, count: created.length }, "Records uploaded");
    return created;
  }

  async listRecords(batchId: number, status?: RecordStatus): Promise<TrackedRecord[]> {
    await this.requireBatch(batchId);
    return this.store.listRecords(batchId, status);
  }

  async clearRecords(batchId: number): Promise<number> {
    await this.requireBatch(batchId);
    const deleted = await this.store.clearRecords(batchId);
    this.logger.info({ batchId, deleted }, "Batch records cleared");
    return deleted;
  }

  private async requireBatch(batchId: number): Promise<void> {
    const batch = await this.store.getBatch(batchId);
    if (!batch) throw new BatchNotFoundError(batchId);
  }
}
