/**
 * Download Controller
 * Handles HTTP requests for download-and-publish and the storage probe.
 */

import { Request, Response, NextFunction } from "express";
import type { MediaPipeline } from "../services/business/mediaPipeline.js";
import type { DownloadRequest } from "../middlewares/schemas/downloadSchema.js";

export function createDownloadController(pipeline: MediaPipeline) {
  /**
   * POST /api/download-and-upload
   * Body is validated by downloadRequestSchema before this runs.
   */
  async function downloadAndUpload(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const { url }: DownloadRequest = req.body;
      const result = await pipeline.run(url);
      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /debug/b2
   * Write-and-sign round trip against object storage.
   */
  async function probeStorage(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.status(200).json(await pipeline.probeStorage());
    } catch (error) {
      next(error);
    }
  }

  return { downloadAndUpload, probeStorage };
}
