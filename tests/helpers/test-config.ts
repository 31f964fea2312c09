import { join } from 'node:path';

import { pino } from 'pino';

import type { Config } from '@/config/index.js';

/** Logger that discards everything. */
export const silentLogger = pino({ level: 'silent' });

/** Full config pointing every file path into `dataDir`. */
export function createTestConfig(dataDir: string, vault: Partial<Config['vault']> = {}): Config {
  return {
    server: { host: '127.0.0.1', port: 0 },
    logging: { level: 'error', pretty: false },
    rateLimit: { global: 1000, sensitive: 1000, windowMs: 60000 },
    env: 'test',
    storage: {
      backend: 'fs',
      timeoutMs: 5000,
      fs: { dataDir: join(dataDir, 'files') },
      s3: {
        region: 'us-east-1',
        bucket: 'vault-relay-test',
        keyPrefix: 'vault/',
        forcePathStyle: false,
      },
    },
    vault: {
      auditLogPath: join(dataDir, 'vault_log.jsonl'),
      integrityLogPath: join(dataDir, 'integrity_log.jsonl'),
      maxUploadBytes: 1024,
      integrityRetention: 1000,
      ...vault,
    },
  };
}

/** multipart/form-data body carrying one file. */
export function createMultipartBody(
  filename: string,
  content: Buffer,
  fieldName = 'file'
): { body: Buffer; boundary: string } {
  const boundary = '----TestBoundary123';
  const body = Buffer.concat([
    Buffer.from(`--${boundary}\r\n`),
    Buffer.from(`Content-Disposition: form-data; name="${fieldName}"; filename="${filename}"\r\n`),
    Buffer.from('Content-Type: application/octet-stream\r\n\r\n'),
    content,
    Buffer.from(`\r\n--${boundary}--\r\n`),
  ]);
  return { body, boundary };
}
