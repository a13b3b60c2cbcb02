/**
 * Media Pipeline
 * One request: download → publish → response body.
 * Extraction always finishes before publishing starts.
 */

import { stat } from "fs/promises";
import path from "path";
import type { MediaDownloader } from "../external/ytdlp.js";
import type { PublishSource, StoragePublisher, StorageProbeResult } from "./publishService.js";
import type { Semaphore } from "../../utils/semaphore.js";
import { createWorkDir, removeWorkDir } from "../../utils/cleanupTemp.js";

/** JSON body of a successful download-and-upload response. */
export interface DownloadResponse {
  source: PublishSource;
  url: string;
  filename: string;
  size_bytes: number | null;
  title: string | null;
  duration: number | null;
  id: string | null;
}

export interface MediaPipelineOptions {
  downloadDir: string;
  /** Download into a throwaway directory instead of downloadDir. */
  useTempWorkDir: boolean;
  /** Creates the per-request work dir. Overridable for tests. */
  createWorkDir?: () => Promise<string>;
}

export class MediaPipeline {
  constructor(
    private readonly downloader: MediaDownloader,
    private readonly publisher: StoragePublisher,
    private readonly gate: Semaphore,
    private readonly options: MediaPipelineOptions
  ) {}

  get storageEnabled(): boolean {
    return this.publisher.storageEnabled;
  }

  /**
   * Downloads `url` and publishes the result.
   * The temp work dir, if any, is removed on every exit path.
   */
  async run(url: string): Promise<DownloadResponse> {
    const workDir = this.options.useTempWorkDir
      ? await (this.options.createWorkDir ?? createWorkDir)()
      : this.options.downloadDir;

    try {
      const result = await this.gate(() => this.downloader.download(url, workDir));
      const filename = path.basename(result.filePath);
      const sizeBytes = await fileSize(result.filePath);
      const location = await this.publisher.publish(result.filePath);

      console.log(`[pipeline] ✓ ${filename} published (${location.source})`);

      return {
        source: location.source,
        url: location.url,
        filename,
        size_bytes: sizeBytes,
        title: result.title ?? null,
        duration: result.durationSeconds ?? null,
        id: result.id ?? null,
      };
    } finally {
      if (this.options.useTempWorkDir) {
        await removeWorkDir(workDir);
      }
    }
  }

  /** Storage round trip without a download. */
  probeStorage(): Promise<StorageProbeResult> {
    return this.publisher.probe();
  }
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).size;
  } catch {
    return null;
  }
}
