// S3-compatible blob store (AWS S3, DigitalOcean Spaces, MinIO).
//
// Objects live at `<keyPrefix><vault_id>/<filename>` in a single bucket and
// are written with a private ACL. Every call carries an abort signal so a
// stalled endpoint cannot block the caller indefinitely.

import {
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { FastifyBaseLogger } from 'fastify';

import { isSafeKeySegment } from './types.js';
import type { BlobStore, GetResult, PutResult } from './types.js';
import type { StorageConfig } from '../config/index.js';

export interface S3BlobStoreOptions {
  bucket: string;
  keyPrefix: string;
  timeoutMs: number;
  logger: FastifyBaseLogger;
  client: S3Client;
}

/**
 * Build an S3 client from config. Credentials fall back to the SDK's default
 * provider chain when not set explicitly.
 */
export function createS3Client(config: StorageConfig['s3']): S3Client {
  return new S3Client({
    region: config.region,
    forcePathStyle: config.forcePathStyle,
    ...(config.endpoint && { endpoint: config.endpoint }),
    ...(config.accessKeyId &&
      config.secretAccessKey && {
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
      }),
  });
}

function isMissingObject(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  return (
    error.name === 'NoSuchKey' ||
    error.name === 'NotFound' ||
    error.$metadata.httpStatusCode === 404
  );
}

export class S3BlobStore implements BlobStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly keyPrefix: string;
  private readonly timeoutMs: number;
  private readonly logger: FastifyBaseLogger;

  constructor(options: S3BlobStoreOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.keyPrefix = options.keyPrefix;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  /** Object key for a vault entry, or null when a segment is unsafe. */
  objectKey(vaultId: string, filename: string): string | null {
    if (!isSafeKeySegment(vaultId) || !isSafeKeySegment(filename)) {
      return null;
    }
    return `${this.keyPrefix}${vaultId}/${filename}`;
  }

  async put(vaultId: string, filename: string, data: Buffer): Promise<PutResult> {
    const key = this.objectKey(vaultId, filename);
    if (!key) {
      return { ok: false, reason: 'storage_error', message: 'Invalid storage key' };
    }

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: data,
          ContentType: 'application/octet-stream',
          ACL: 'private',
        }),
        { abortSignal: AbortSignal.timeout(this.timeoutMs) }
      );
      return { ok: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ err: message, bucket: this.bucket, key }, 'S3 upload failed');
      return { ok: false, reason: 'storage_error', message };
    }
  }

  async get(vaultId: string, filename: string): Promise<GetResult> {
    const key = this.objectKey(vaultId, filename);
    if (!key) {
      return { ok: false, reason: 'not_found' };
    }

    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { abortSignal: AbortSignal.timeout(this.timeoutMs) }
      );
      if (!response.Body) {
        return { ok: false, reason: 'storage_error', message: 'Empty response body' };
      }
      const bytes = await response.Body.transformToByteArray();
      return { ok: true, data: Buffer.from(bytes) };
    } catch (error) {
      if (isMissingObject(error)) {
        return { ok: false, reason: 'not_found' };
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ err: message, bucket: this.bucket, key }, 'S3 download failed');
      return { ok: false, reason: 'storage_error', message };
    }
  }

  async healthy(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }), {
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });
      return true;
    } catch (error) {
      this.logger.error(
        { err: error instanceof Error ? error.message : 'Unknown error', bucket: this.bucket },
        'S3 connectivity check failed'
      );
      return false;
    }
  }
}
