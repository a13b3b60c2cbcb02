/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";

export function createHealthRouter(storageEnabled: boolean): Router {
  const router = Router();

  /** Simple health check endpoint. */
  router.get(["/health", "/api/health"], (_req, res) => {
    res.json({ status: "ok", storage: { enabled: storageEnabled } });
  });

  /** Readiness check endpoint for container orchestration. */
  router.get("/ready", (_req, res) => {
    res.json({ ready: true });
  });

  return router;
}
