import express, { type Express } from "express";
import helmet from "helmet";
import cors from "cors";
import type { AppConfig } from "./config/env.js";
import { createS3Client } from "./config/s3.js";
import { createRouter } from "./routes/index.js";
import { createApiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler.js";
import { S3ObjectStorage, type ObjectStorage } from "./services/external/storage.js";
import { YtDlpDownloader, type MediaDownloader } from "./services/external/ytdlp.js";
import { StoragePublisher } from "./services/business/publishService.js";
import { MediaPipeline } from "./services/business/mediaPipeline.js";
import { createSemaphore } from "./utils/semaphore.js";

/** Collaborators tests replace with in-process fakes. */
export interface AppOverrides {
  downloader?: MediaDownloader;
  storage?: ObjectStorage;
}

/**
 * Wires the downloader, object storage and publisher from configuration.
 * The S3 client is built once here, and only when storage is enabled.
 */
export function createPipeline(config: AppConfig, overrides: AppOverrides = {}): MediaPipeline {
  const downloader =
    overrides.downloader ??
    new YtDlpDownloader({
      binaryPath: config.ytdlpPath,
      cookies: config.cookies,
      socketTimeoutSeconds: config.socketTimeoutSeconds,
    });

  const storage = config.storage.enabled
    ? overrides.storage ?? new S3ObjectStorage(createS3Client(config.storage), config.storage.bucket)
    : null;

  const publisher = new StoragePublisher(config.storage, config.downloadDir, storage);

  return new MediaPipeline(downloader, publisher, createSemaphore(config.maxConcurrentDownloads), {
    downloadDir: config.downloadDir,
    useTempWorkDir: config.useTempWorkDir,
  });
}

/**
 * Express application.
 * Configures global middleware and routes.
 */
export function createApp(config: AppConfig, overrides: AppOverrides = {}): Express {
  const app = express();
  const pipeline = createPipeline(config, overrides);

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());
  /** Parses JSON request bodies; only a URL is ever sent. */
  app.use(express.json({ limit: "1mb" }));

  /** Rate limiting for all routes. */
  app.use(createApiLimiter());

  /** Application routes. */
  app.use(createRouter({ pipeline, downloadDir: config.downloadDir, staticDir: config.staticDir }));

  app.use(notFoundHandler);
  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
