import { Router } from "express";

export const SERVICE_VERSION = "1.0.0";

export const healthRouter = Router();

healthRouter.get("/", (_req, res) => {
  res.json({
    message: "Pipeline Record Reconciliation API",
    status: "running",
    version: SERVICE_VERSION
  });
});

healthRouter.get("/health", (_req, res) => {
  res.json({ status: "healthy" });
});
