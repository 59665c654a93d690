import { randomUUID } from "node:crypto";
import cors from "cors";
import express from "express";
import multer from "multer";
import type { Logger } from "pino";
import { createAnalysisRouter } from "./routes/analysis.js";
import { createBatchRouter } from "./routes/batches.js";
import { healthRouter } from "./routes/health.js";
import { createRecordRouter } from "./routes/records.js";
import { BatchService } from "./services/batchService.js";
import { ReconciliationService } from "./services/reconciliationService.js";
import { RecordService } from "./services/recordService.js";
import type { RecordStore } from "./services/recordStore.js";

export interface AppOptions {
  store: RecordStore;
  logger: Logger;
  corsOrigin: string;
  maxBulkRecords: number;
}

export function createApp({ store, logger, corsOrigin, maxBulkRecords }: AppOptions) {
  const batchService = new BatchService(store, logger.child({ component: "batchService" }));
  const recordService = new RecordService(store, logger.child({ component: "recordService" }));
  const reconciliationService = new ReconciliationService(store, logger.child({ component: "reconciliationService" }));
  const routeLogger = logger.child({ component: "http" });

  const allowedOrigins = new Set([corsOrigin, "http://localhost:5173", "http://localhost:8001"]);

  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }
        callback(new Error("cors_not_allowed"));
      }
    })
  );
  app.use((req, res, next) => {
    const requestId = req.header("x-request-id") || randomUUID();
    res.setHeader("x-request-id", requestId);
    req.headers["x-request-id"] = requestId;
    next();
  });
  app.use(express.json({ limit: "10mb" }));

  app.use(healthRouter);
  app.use(createBatchRouter(batchService, routeLogger));
  app.use(createRecordRouter(recordService, routeLogger, maxBulkRecords));
  app.use(createAnalysisRouter(reconciliationService, routeLogger));

  app.use((_req, res) => {
    res.status(404).json({ error: "route_not_found" });
  });

  // Body-parser, multer and cors failures land here.
  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "invalid_json", detail: error.message });
      return;
    }
    if (error instanceof multer.MulterError) {
      res.status(400).json({ error: "invalid_upload", detail: error.message });
      return;
    }
    routeLogger.error({ err: error, requestId: req.header("x-request-id") }, "Unhandled request failure");
    res.status(500).json({ error: "internal_error" });
  });

  return app;
}
