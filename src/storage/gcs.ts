/**
 * Cloud Storage backend over the S3-compatible XML API, authenticated with
 * HMAC keys through the AWS SDK. URIs use the gs:// scheme BigQuery loads from.
 */
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { PutObjectCommand, S3Client, type S3ClientConfig } from "@aws-sdk/client-s3";
import type { StorageBackend } from "./backend.js";

export interface GcsStorageConfig {
  endpoint: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  region?: string;
}

/**
 * The XML API rejects aws-chunked uploads with checksum trailers, so
 * checksums are only sent and verified where an operation requires them.
 */
export function gcsClientConfig(config: GcsStorageConfig): S3ClientConfig {
  return {
    endpoint: config.endpoint,
    region: config.region ?? "auto",
    forcePathStyle: true,
    requestChecksumCalculation: "WHEN_REQUIRED",
    responseChecksumValidation: "WHEN_REQUIRED",
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  };
}

export class GcsStorage implements StorageBackend {
  private client: S3Client;
  private bucket: string;

  constructor(config: GcsStorageConfig) {
    this.client = new S3Client(gcsClientConfig(config));
    this.bucket = config.bucket;
  }

  async upload(localPath: string, key: string): Promise<void> {
    const { size } = await stat(localPath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(localPath),
        ContentLength: size,
        ContentType: "application/octet-stream",
      }),
    );
  }

  uri(key: string): string {
    return `gs://${this.bucket}/${key}`;
  }
}
