import { Router } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { BatchService } from "../services/batchService.js";
import { RECORD_TYPES } from "../types/batch.js";
import { parseBatchId, sendServiceError } from "./http.js";

const createBatchSchema = z.object({
  batchName: z.string().trim().min(1).max(255),
  recordType: z.enum(RECORD_TYPES),
  description: z.string().nullish()
});

export function createBatchRouter(batchService: BatchService, logger: Logger) {
  const batchRouter = Router();

  batchRouter.post("/api/v1/batches", async (req, res) => {
    const parsed = createBatchSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    try {
      const created = await batchService.createBatch(parsed.data);
      return res.status(201).json(created);
    } catch (error) {
      return sendServiceError(res, logger, error, "batch_create_failed");
    }
  });

  batchRouter.get("/api/v1/batches", async (_req, res) => {
    try {
      const batches = await batchService.listBatches();
      return res.json(batches);
    } catch (error) {
      return sendServiceError(res, logger, error, "batch_list_failed");
    }
  });

  batchRouter.get("/api/v1/batches/:batchId", async (req, res) => {
    const batchId = parseBatchId(req.params.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });

    try {
      const batch = await batchService.getBatch(batchId);
      return res.json(batch);
    } catch (error) {
      return sendServiceError(res, logger, error, "batch_fetch_failed");
    }
  });

  batchRouter.delete("/api/v1/batches/:batchId", async (req, res) => {
    const batchId = parseBatchId(req.params.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });

    try {
      await batchService.deleteBatch(batchId);
      return res.json({
        message: `Successfully deleted batch ${batchId}`,
        details: { batchId }
      });
    } catch (error) {
      return sendServiceError(res, logger, error, "batch_delete_failed");
    }
  });

  return batchRouter;
}
