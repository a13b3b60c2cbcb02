/**
 * Download Routes
 * Download-and-publish endpoint and the storage probe.
 */

import { Router } from "express";
import type { MediaPipeline } from "../services/business/mediaPipeline.js";
import { createDownloadController } from "../controllers/downloadController.js";
import { validateBody } from "../middlewares/validation.js";
import { downloadRequestSchema } from "../middlewares/schemas/downloadSchema.js";
import { createStrictLimiter } from "../middlewares/rateLimiting.js";

export function createDownloadRouter(pipeline: MediaPipeline): Router {
  const router = Router();
  const { downloadAndUpload, probeStorage } = createDownloadController(pipeline);

  /** Download a media URL and publish the file */
  router.post(
    "/api/download-and-upload",
    createStrictLimiter(),
    validateBody(downloadRequestSchema),
    downloadAndUpload
  );

  /** Storage probe; no download involved */
  router.post("/debug/b2", probeStorage);

  return router;
}
