import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import type { Readable } from "stream";
import { buffer } from "stream/consumers";
import type { AppConfig, EnabledStorageConfig } from "../../src/config/env.js";
import type { ObjectStorage, PutObjectOptions } from "../../src/services/external/storage.js";
import type { ExtractionResult, MediaDownloader } from "../../src/services/external/ytdlp.js";

export const TEST_ENDPOINT = "https://s3.us-west-002.backblazeb2.com";

export function enabledStorage(overrides: Partial<EnabledStorageConfig> = {}): EnabledStorageConfig {
  return {
    enabled: true,
    keyId: "test-key-id",
    applicationKey: "test-secret",
    bucket: "test-bucket",
    endpoint: TEST_ENDPOINT,
    region: "us-west-002",
    publicRead: true,
    presignedTtlSeconds: 604800,
    datePrefixedKeys: false,
    ...overrides,
  };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    downloadDir: path.join(os.tmpdir(), "media-relay-unused-downloads"),
    staticDir: path.join(os.tmpdir(), "media-relay-unused-static"),
    useTempWorkDir: false,
    maxConcurrentDownloads: 2,
    ytdlpPath: "yt-dlp",
    cookies: { kind: "none" },
    storage: { enabled: false },
    ...overrides,
  };
}

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `media-relay-${label}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

interface StoredObject {
  body: Buffer;
  contentType?: string;
  contentLength?: number;
}

/**
 * Object storage kept in a Map. Bodies are always read in full;
 * `failWith` then makes the put reject.
 */
export class InMemoryObjectStorage implements ObjectStorage {
  readonly objects = new Map<string, StoredObject>();
  readonly signed: Array<{ key: string; expiresInSeconds: number }> = [];
  failWith: Error | null = null;
  /** Runs after the body is read, before storing or failing. */
  beforeStore: (() => Promise<void>) | null = null;

  constructor(readonly bucket: string = "test-bucket") {}

  async putObject(key: string, body: Readable | Buffer, options: PutObjectOptions = {}): Promise<void> {
    const bytes = Buffer.isBuffer(body) ? body : await buffer(body);
    if (this.beforeStore) {
      await this.beforeStore();
    }
    if (this.failWith) {
      throw this.failWith;
    }
    this.objects.set(key, { body: bytes, ...options });
  }

  async getSignedDownloadUrl(key: string, expiresInSeconds: number): Promise<string> {
    this.signed.push({ key, expiresInSeconds });
    return `https://signed.example.test/${this.bucket}/${key}?X-Amz-Expires=${expiresInSeconds}&X-Amz-Signature=fake`;
  }
}

type DownloadBehavior = (url: string, outputDir: string) => Promise<ExtractionResult>;

export class FakeDownloader implements MediaDownloader {
  readonly calls: Array<{ url: string; outputDir: string }> = [];

  constructor(private readonly behavior: DownloadBehavior) {}

  download(url: string, outputDir: string): Promise<ExtractionResult> {
    this.calls.push({ url, outputDir });
    return this.behavior(url, outputDir);
  }
}

/**
 * Downloader behavior that writes `content` to `<outputDir>/<fileName>`.
 */
export function writesFile(
  fileName: string,
  metadata: Omit<ExtractionResult, "filePath"> = {},
  content: string = "video-bytes"
): DownloadBehavior {
  return async (_url, outputDir) => {
    const filePath = path.join(outputDir, fileName);
    await writeFile(filePath, content);
    return { filePath, ...metadata };
  };
}

export function failsWith(error: Error): DownloadBehavior {
  return async () => {
    throw error;
  };
}
