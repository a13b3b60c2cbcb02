/**
 * S3-compatible Object Storage Client
 * Backblaze B2 (or any S3-compatible store) through the AWS SDK with a custom endpoint.
 * Built once at startup and injected; nothing here is global.
 */

import { S3Client } from "@aws-sdk/client-s3";
import type { EnabledStorageConfig } from "./env.js";

export function createS3Client(storage: EnabledStorageConfig): S3Client {
  return new S3Client({
    region: storage.region,
    endpoint: storage.endpoint,
    // Keeps the bucket in the path so presigned and public URLs share one shape.
    forcePathStyle: true,
    // Not every S3-compatible store accepts aws-chunked uploads with checksum trailers.
    requestChecksumCalculation: "WHEN_REQUIRED",
    responseChecksumValidation: "WHEN_REQUIRED",
    credentials: {
      accessKeyId: storage.keyId,
      secretAccessKey: storage.applicationKey,
    },
  });
}
