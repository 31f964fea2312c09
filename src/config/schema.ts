import { z } from 'zod';

/** 100 MiB, the largest upload accepted by POST /ingest. */
export const DEFAULT_MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

/** Integrity-check lines kept after each auditor run. */
export const DEFAULT_INTEGRITY_RETENTION = 1000;

/**
 * Blob store configuration.
 *
 * SECURITY: `s3.accessKeyId` and `s3.secretAccessKey` are sensitive. Prefer
 * supplying them through the VAULT_S3_* environment variables; they must never
 * appear in logs.
 */
export const StorageConfigSchema = z
  .object({
    /** Storage backend type */
    backend: z.enum(['fs', 's3']).default('fs'),
    /** Upper bound for every blob store call (milliseconds) */
    timeoutMs: z.number().int().min(100).max(300_000).default(10_000),
    /** Filesystem backend options */
    fs: z
      .object({
        /** Directory for stored files (default: ./data/files) */
        dataDir: z.string().default('./data/files'),
      })
      .default(() => ({ dataDir: './data/files' })),
    /** S3-compatible backend options (AWS S3, DigitalOcean Spaces, MinIO) */
    s3: z
      .object({
        /** Custom endpoint; omit for AWS S3 */
        endpoint: z.string().url().optional(),
        region: z.string().min(1).default('us-east-1'),
        bucket: z.string().min(1).default('vault-relay'),
        /** Prepended to every `{vault_id}/{filename}` key */
        keyPrefix: z.string().default('vault/'),
        forcePathStyle: z.boolean().default(false),
        accessKeyId: z.string().min(1).optional(),
        secretAccessKey: z.string().min(1).optional(),
      })
      .refine(
        (d) => (d.accessKeyId === undefined) === (d.secretAccessKey === undefined),
        'accessKeyId and secretAccessKey must be provided together'
      )
      .default(() => ({
        region: 'us-east-1',
        bucket: 'vault-relay',
        keyPrefix: 'vault/',
        forcePathStyle: false,
      })),
  })
  .default(() => ({
    backend: 'fs' as const,
    timeoutMs: 10_000,
    fs: { dataDir: './data/files' },
    s3: { region: 'us-east-1', bucket: 'vault-relay', keyPrefix: 'vault/', forcePathStyle: false },
  }));

export const VaultConfigSchema = z
  .object({
    /** Append-only ingest/retrieve log (JSON lines) */
    auditLogPath: z.string().default('./data/vault_log.jsonl'),
    /** Append-only integrity-check trail (JSON lines) */
    integrityLogPath: z.string().default('./data/integrity_log.jsonl'),
    maxUploadBytes: z.number().int().min(1).default(DEFAULT_MAX_UPLOAD_BYTES),
    integrityRetention: z.number().int().min(1).default(DEFAULT_INTEGRITY_RETENTION),
  })
  .default(() => ({
    auditLogPath: './data/vault_log.jsonl',
    integrityLogPath: './data/integrity_log.jsonl',
    maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
    integrityRetention: DEFAULT_INTEGRITY_RETENTION,
  }));

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000 })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('production'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode; error details reach callers only under 'development'
  env: z.enum(['development', 'production', 'test']).default('production'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      sensitive: z.number().int().min(1).default(20),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 100, sensitive: 20, windowMs: 60000 })),

  storage: StorageConfigSchema,

  vault: VaultConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type StorageConfig = Config['storage'];
export type VaultConfig = Config['vault'];
