import type { Logger } from "pino";
import type { BatchRecord } from "../types/batch.js";
import type { BatchStatistics, MissingRecordsResult, ProcessingStatusResult } from "../types/reconciliation.js";
import { BatchNotFoundError } from "./errors.js";
import { reconcileIds } from "./reconciliationEngine.js";
import type { RecordStore } from "./recordStore.js";

/**
 * Batch-scoped views over the expected/processed id sets. Each call reads
 * both collections once and computes in memory; nothing is written.
 */
export class ReconciliationService {
  constructor(
    private readonly store: RecordStore,
    private readonly logger: Logger
  ) {}

  async reconcile(batchId: number): Promise<MissingRecordsResult> {
    const { batch, expectedIds, processedIds } = await this.loadIds(batchId);
    const summary = reconcileIds(expectedIds, processedIds);

    this.logger.debug(
      { batchId, missingCount: summary.missingCount, unexpectedCount: summary.unexpectedCount, processingRate: summary.processingRate },
      "Batch reconciled"
    );

    return {
      batchId: batch.id,
      batchName: batch.batchName,
      totalExpected: summary.totalExpected,
      totalProcessed: summary.totalProcessed,
      missingCount: summary.missingCount,
      missingRecords: summary.missingRecords,
      processingRate: summary.processingRate,
      unexpectedCount: summary.unexpectedCount,
      unexpectedRecords: summary.unexpectedRecords
    };
  }

  async getProcessingStatus(batchId: number): Promise<ProcessingStatusResult> {
    const { batch, expectedIds, processedIds } = await this.loadIds(batchId);
    return {
      batchId: batch.id,
      batchName: batch.batchName,
      recordType: batch.recordType,
      expectedRecords: expectedIds,
      processedRecords: processedIds,
      expectedCount: expectedIds.length,
      processedCount: processedIds.length
    };
  }

  async getBatchStatistics(batchId: number): Promise<BatchStatistics> {
    const { batch, expectedIds, processedIds } = await this.loadIds(batchId);
    const summary = reconcileIds(expectedIds, processedIds);

    return {
      batchId: batch.id,
      batchName: batch.batchName,
      totalRecords: expectedIds.length + processedIds.length,
      expectedCount: expectedIds.length,
      processedCount: processedIds.length,
      totalExpected: summary.totalExpected,
      totalProcessed: summary.totalProcessed,
      missingCount: summary.missingCount,
      unexpectedCount: summary.unexpectedCount,
      processingRate: summary.processingRate
    };
  }

  private async loadIds(batchId: number): Promise<{ batch: BatchRecord; expectedIds: number[]; processedIds: number[] }> {
    const batch = await this.store.getBatch(batchId);
    if (!batch) throw new BatchNotFoundError(batchId);

    const [expectedIds, processedIds] = await Promise.all([
      this.store.fetchIds(batchId, "expected"),
      this.store.fetchIds(batchId, "processed")
    ]);
    return { batch, expectedIds, processedIds };
  }
}
