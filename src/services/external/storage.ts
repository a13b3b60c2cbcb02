/**
 * Storage External Client — S3-compatible object store
 * Thin wrapper around the AWS S3 SDK.
 * No business logic, no file I/O — accepts bodies and keys only.
 */

import type { Readable } from "stream";
import { GetObjectCommand, PutObjectCommand, type S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";

export interface PutObjectOptions {
  contentType?: string;
  contentLength?: number;
}

/**
 * The two things the publisher needs from object storage.
 * Tests substitute an in-memory implementation.
 */
export interface ObjectStorage {
  readonly bucket: string;
  putObject(key: string, body: Readable | Buffer, options?: PutObjectOptions): Promise<void>;
  getSignedDownloadUrl(key: string, expiresInSeconds: number): Promise<string>;
}

export class S3ObjectStorage implements ObjectStorage {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string
  ) {}

  /**
   * Upload a body to the given key. Overwrites silently, like S3 itself.
   */
  async putObject(key: string, body: Readable | Buffer, options: PutObjectOptions = {}): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: options.contentType,
        ContentLength: options.contentLength,
      })
    );
  }

  /**
   * Presigned GET URL. Signing is local; no request is made.
   */
  async getSignedDownloadUrl(key: string, expiresInSeconds: number): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn: expiresInSeconds,
    });
  }
}
