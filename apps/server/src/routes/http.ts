import type { Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { BatchNotFoundError, DuplicateBatchNameError } from "../services/errors.js";

export const batchIdSchema = z.coerce.number().int().positive();

export function parseBatchId(raw: unknown): number | null {
  const parsed = batchIdSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Maps service errors onto the API's `{ error, detail }` shape. Anything not
 * recognised is logged and answered with `fallbackCode`.
 */
export function sendServiceError(res: Response, logger: Logger, error: unknown, fallbackCode: string) {
  if (error instanceof BatchNotFoundError) {
    return res.status(404).json({ error: error.code, detail: error.message });
  }
  if (error instanceof DuplicateBatchNameError) {
    return res.status(400).json({ error: error.code, detail: error.message });
  }

  logger.error({ err: error, requestId: res.getHeader("x-request-id") }, fallbackCode);
  return res.status(500).json({
    error: fallbackCode,
    detail: error instanceof Error ? error.message : "unknown_error"
  });
}
