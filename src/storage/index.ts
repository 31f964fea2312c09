// Storage module barrel export and factory function.

import type { FastifyBaseLogger } from 'fastify';

import { FsBlobStore } from './fs-backend.js';
import { S3BlobStore, createS3Client } from './s3-backend.js';
import type { BlobStore } from './types.js';
import type { StorageConfig } from '../config/index.js';

export type { BlobStore, GetResult, PutResult } from './types.js';
export { isSafeKeySegment } from './types.js';
export { FsBlobStore } from './fs-backend.js';
export { S3BlobStore, createS3Client } from './s3-backend.js';
export { StorageTimeoutError, withTimeout } from './timeout.js';

/**
 * Create a blob store based on configuration.
 */
export function createBlobStore(config: StorageConfig, logger: FastifyBaseLogger): BlobStore {
  switch (config.backend) {
    case 's3':
      return new S3BlobStore({
        client: createS3Client(config.s3),
        bucket: config.s3.bucket,
        keyPrefix: config.s3.keyPrefix,
        timeoutMs: config.timeoutMs,
        logger,
      });
    case 'fs':
    default:
      return new FsBlobStore({
        dataDir: config.fs.dataDir,
        timeoutMs: config.timeoutMs,
        logger,
      });
  }
}
