import { Router } from "express";
import multer from "multer";
import type { Logger } from "pino";
import { z } from "zod";
import type { RecordService } from "../services/recordService.js";
import { RECORD_ID_MAX, RECORD_ID_MIN, RECORD_STATUSES } from "../types/batch.js";
import { batchIdSchema, parseBatchId, sendServiceError } from "./http.js";

const recordInputSchema = z.object({
  recordId: z.number().int().min(RECORD_ID_MIN).max(RECORD_ID_MAX),
  status: z.enum(RECORD_STATUSES),
  recordMetadata: z.string().nullish()
});

const statusSchema = z.enum(RECORD_STATUSES);

const uploadMemory = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 16 * 1024 * 1024
  }
});

interface ManifestRow {
  recordId: number;
  status: string;
  recordMetadata?: string;
}

/**
 * Reads a `record_id,status[,record_metadata]` CSV. Metadata is taken as the
 * remainder of the line so it may itself contain commas.
 */
export function parseCsvManifest(csvBuffer: Buffer): ManifestRow[] {
  const lines = csvBuffer
    .toString("utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  if (lines.length < 2) return [];
  const headers = lines[0].split(",").map((h) => h.trim().toLowerCase());
  const recordIdIx = headers.indexOf("record_id");
  const statusIx = headers.indexOf("status");
  const metadataIx = headers.indexOf("record_metadata");

  if (recordIdIx < 0 || statusIx < 0) return [];

  return lines.slice(1).map((line) => {
    const rawCols = line.split(",");
    const cols = rawCols.map((value) => value.trim());
    const metadata = metadataIx >= 0 ? rawCols.slice(metadataIx).join(",").trim() : "";
    return {
      recordId: /^-?\d+$/.test(cols[recordIdIx] ?? "") ? Number(cols[recordIdIx]) : Number.NaN,
      status: cols[statusIx] ?? "",
      recordMetadata: metadata || undefined
    };
  });
}

export function createRecordRouter(recordService: RecordService, logger: Logger, maxBulkRecords: number) {
  const recordRouter = Router();

  const bulkUploadSchema = z.object({
    batchId: batchIdSchema,
    records: z.array(recordInputSchema).min(1).max(maxBulkRecords)
  });

  recordRouter.post("/api/v1/records", async (req, res) => {
    const batchId = parseBatchId(req.query.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });

    const parsed = recordInputSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    try {
      const created = await recordService.createRecord(batchId, parsed.data);
      return res.status(201).json(created);
    } catch (error) {
      return sendServiceError(res, logger, error, "record_create_failed");
    }
  });

  recordRouter.post("/api/v1/records/bulk", uploadMemory.single("manifest"), async (req, res) => {
    const manifestFile = req.file;
    const candidate = manifestFile
      ? { batchId: req.body.batchId, records: parseCsvManifest(manifestFile.buffer) }
      : req.body;

    const parsed = bulkUploadSchema.safeParse(candidate);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    const { batchId, records } = parsed.data;
    try {
      const created = await recordService.bulkCreateRecords(batchId, records);
      return res.status(201).json({
        message: `Successfully uploaded ${created.length} records`,
        details: { count: created.length, batchId }
      });
    } catch (error) {
      return sendServiceError(res, logger, error, "record_bulk_upload_failed");
    }
  });

  recordRouter.get("/api/v1/records/batch/:batchId", async (req, res) => {
    const batchId = parseBatchId(req.params.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });

    try {
      const records = await recordService.listRecords(batchId);
      return res.json(records);
    } catch (error) {
      return sendServiceError(res, logger, error, "record_list_failed");
    }
  });

  recordRouter.get("/api/v1/records/batch/:batchId/status/:status", async (req, res) => {
    const batchId = parseBatchId(req.params.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });
    const status = statusSchema.safeParse(req.params.status);
    if (!status.success) return res.status(400).json({ error: "invalid_status" });

    try {
      const records = await recordService.listRecords(batchId, status.data);
      return res.json(records);
    } catch (error) {
      return sendServiceError(res, logger, error, "record_list_failed");
    }
  });

  recordRouter.delete("/api/v1/records/batch/:batchId", async (req, res) => {
    const batchId = parseBatchId(req.params.batchId);
    if (batchId === null) return res.status(400).json({ error: "invalid_batch_id" });

    try {
      const deletedCount = await recordService.clearRecords(batchId);
      return res.json({
        message: `Successfully deleted all records for batch ${batchId}`,
        details: { deletedCount, batchId }
      });
    } catch (error) {
      return sendServiceError(res, logger, error, "record_clear_failed");
    }
  });

  return recordRouter;
}
