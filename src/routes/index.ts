/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import express, { Router } from "express";
import type { MediaPipeline } from "../services/business/mediaPipeline.js";
import { createHealthRouter } from "./health.js";
import { createDownloadRouter } from "./download.js";
import { createPageController } from "../controllers/pageController.js";
import { LOCAL_DOWNLOADS_PREFIX } from "../services/business/publishService.js";

export interface RouterOptions {
  pipeline: MediaPipeline;
  downloadDir: string;
  staticDir: string;
}

export function createRouter({ pipeline, downloadDir, staticDir }: RouterOptions): Router {
  const router = Router();
  const { index } = createPageController(staticDir);

  /** Register all route modules */
  router.get("/", index);
  router.use(createHealthRouter(pipeline.storageEnabled));
  router.use(createDownloadRouter(pipeline));

  /** Static mounts: landing page assets and downloaded files */
  router.use("/static", express.static(staticDir));
  router.use([LOCAL_DOWNLOADS_PREFIX, `/api${LOCAL_DOWNLOADS_PREFIX}`], express.static(downloadDir));

  return router;
}
