/**
 * Publish Service
 * Makes a downloaded file reachable: served from the download directory,
 * or uploaded to object storage behind a public or presigned URL.
 */

import { createReadStream } from "fs";
import { copyFile, rename, stat, unlink } from "fs/promises";
import path from "path";
import mime from "mime-types";
import type { EnabledStorageConfig, StorageConfig } from "../../config/env.js";
import type { ObjectStorage } from "../external/storage.js";
import { StoragePaths } from "../../utils/storagePaths.js";
import { StorageHealthcheckError, UploadFailedError } from "../../utils/errors.js";

/** URL prefix express.static serves DOWNLOAD_DIR under. */
export const LOCAL_DOWNLOADS_PREFIX = "/downloads";

/** Probe URLs only need to live long enough to click. */
export const PROBE_TTL_CEILING_SECONDS = 300;

export type PublishSource = "local" | "remote";

export interface PublishedLocation {
  url: string;
  source: PublishSource;
}

export type StorageProbeResult =
  | { enabled: false; message: string }
  | { enabled: true; bucket: string; url: string };

/**
 * Relative URL for a file in the download directory. Base name only.
 */
export function localUrl(filePath: string): string {
  return `${LOCAL_DOWNLOADS_PREFIX}/${encodeURIComponent(path.basename(filePath))}`;
}

/**
 * `<base>/<key>`, base defaulting to `<endpoint>/<bucket>`.
 */
export function publicObjectUrl(storage: EnabledStorageConfig, key: string): string {
  const base = (storage.publicBaseUrl ?? `${storage.endpoint}/${storage.bucket}`).replace(/\/+$/, "");
  return `${base}/${key}`;
}

export class StoragePublisher {
  constructor(
    private readonly storageConfig: StorageConfig,
    private readonly downloadDir: string,
    private readonly storage: ObjectStorage | null,
    private readonly now: () => Date = () => new Date()
  ) {}

  get storageEnabled(): boolean {
    return this.storageConfig.enabled;
  }

  /**
   * Uploads when storage is enabled, otherwise serves locally.
   * A failed upload still yields a local URL while the file exists.
   */
  async publish(filePath: string): Promise<PublishedLocation> {
    if (!this.storageConfig.enabled || !this.storage) {
      return this.publishLocally(filePath);
    }

    try {
      const url = await this.upload(filePath, this.storageConfig, this.storage);
      return { url, source: "remote" };
    } catch (error) {
      console.error(`[publish] Upload failed for ${path.basename(filePath)}:`, error);
      if (await exists(filePath)) {
        console.log(`[publish] Falling back to local URL for ${path.basename(filePath)}`);
        return this.publishLocally(filePath);
      }
      throw new UploadFailedError(error);
    }
  }

  /**
   * Writes a tiny object and signs a URL for it, without downloading anything.
   */
  async probe(): Promise<StorageProbeResult> {
    if (!this.storageConfig.enabled || !this.storage) {
      return { enabled: false, message: "Object storage is disabled (set B2_ENABLED=true in .env)" };
    }

    const config = this.storageConfig;
    const key = StoragePaths.healthcheck();
    try {
      await this.storage.putObject(key, Buffer.from("ok"), { contentType: "text/plain" });
      const url = config.publicRead
        ? publicObjectUrl(config, key)
        : await this.storage.getSignedDownloadUrl(
            key,
            Math.min(config.presignedTtlSeconds, PROBE_TTL_CEILING_SECONDS)
          );
      return { enabled: true, bucket: this.storage.bucket, url };
    } catch (error) {
      throw new StorageHealthcheckError(error);
    }
  }

  private async upload(
    filePath: string,
    config: EnabledStorageConfig,
    storage: ObjectStorage
  ): Promise<string> {
    const key = StoragePaths.upload(filePath, config.datePrefixedKeys ? { date: this.now() } : {});
    const { size } = await stat(filePath);
    const contentType = mime.lookup(filePath);

    const body = createReadStream(filePath);
    try {
      await storage.putObject(key, body, {
        contentType: contentType || undefined,
        contentLength: size,
      });
    } finally {
      body.destroy();
    }
    console.log(`[storage] Uploaded ${path.basename(filePath)} → ${key} (${(size / (1024 * 1024)).toFixed(1)}MB)`);

    if (config.publicRead) {
      return publicObjectUrl(config, key);
    }
    return storage.getSignedDownloadUrl(key, config.presignedTtlSeconds);
  }

  /**
   * Moves the file into the served directory if it was downloaded elsewhere.
   */
  private async publishLocally(filePath: string): Promise<PublishedLocation> {
    const target = path.join(this.downloadDir, path.basename(filePath));
    if (path.resolve(filePath) !== path.resolve(target)) {
      await moveFile(filePath, target);
    }
    return { url: localUrl(target), source: "local" };
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

/** rename, or copy+unlink when the temp dir is on another device. */
async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EXDEV") {
      await copyFile(from, to);
      await unlink(from);
      return;
    }
    throw error;
  }
}
