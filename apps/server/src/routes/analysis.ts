import { Router } from "express";
import type { Logger } from "pino";
import type { ReconciliationService } from "../services/reconciliationService.js";
import { parseBatchId, sendServiceError } from "./http.js";

export function createAnalysisRouter(reconciliationService: ReconciliationService, logger: Logger) {
  const analysisRouter = Router();

  analysisRouter.get("/api/v1/analysis/missing/:batchId", async (req, res) => {
    const batchId = parseBatchId(req.params.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });

    try {
      return res.json(await reconciliationService.reconcile(batchId));
    } catch (error) {
      return sendServiceError(res, logger, error, "reconciliation_failed");
    }
  });

  analysisRouter.get("/api/v1/analysis/status/:batchId", async (req, res) => {
    const batchId = parseBatchId(req.params.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });

    try {
      return res.json(await reconciliationService.getProcessingStatus(batchId));
    } catch (error) {
      return sendServiceError(res, logger, error, "processing_status_failed");
    }
  });

  analysisRouter.get("/api/v1/analysis/statistics/:batchId", async (req, res) => {
    const batchId = parseBatchId(req.params.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });

    try {
      return res.json(await reconciliationService.getBatchStatistics(batchId));
    } catch (error) {
      return sendServiceError(res, logger, error, "batch_statistics_failed");
    }
  });

  return analysisRouter;
}
