// Vault service: ingest, retrieval and verification.
//
// Ingest:    sanitize -> digest -> fresh vault id -> put -> audit record
// Retrieve:  get -> digest -> audit record -> bytes (no comparison)
// Verify:    get -> digest -> original digest from audit log -> compare
//
// Retrieval deliberately serves content whose digest has drifted; only verify
// compares against the digest recorded at ingest.

import type { FastifyBaseLogger } from 'fastify';

import { sanitizeFilename, isSanitizedFilename } from './filename.js';
import { failure, success } from './types.js';
import type {
  RetrievedBlob,
  VaultEntry,
  VaultMetadata,
  VaultResult,
  VerificationReport,
} from './types.js';
import { generateVaultId, isValidVaultId } from './vault-id.js';
import { computeDigest } from '../integrity/digest.js';
import type { AuditLog } from '../logs/audit-log.js';
import type { BlobStore } from '../storage/types.js';

export interface VaultServiceOptions {
  storage: BlobStore;
  auditLog: AuditLog;
  logger: FastifyBaseLogger;
  /** Largest accepted payload in bytes */
  maxUploadBytes: number;
  /** Vault id generator (default: random UUID) */
  generateId?: () => string;
}

export class VaultService {
  private readonly storage: BlobStore;
  private readonly auditLog: AuditLog;
  private readonly logger: FastifyBaseLogger;
  private readonly maxUploadBytes: number;
  private readonly generateId: () => string;

  constructor(options: VaultServiceOptions) {
    this.storage = options.storage;
    this.auditLog = options.auditLog;
    this.logger = options.logger;
    this.maxUploadBytes = options.maxUploadBytes;
    this.generateId = options.generateId ?? generateVaultId;
  }

  async ingest(originalFilename: string, data: Buffer): Promise<VaultResult<VaultEntry>> {
    const filename = sanitizeFilename(originalFilename);
    if (!filename) {
      return failure({ kind: 'validation', message: 'Invalid filename' });
    }

    if (data.length > this.maxUploadBytes) {
      return failure({
        kind: 'too_large',
        message: `File exceeds the maximum upload size of ${this.maxUploadBytes} bytes`,
        limitBytes: this.maxUploadBytes,
      });
    }

    const contentDigest = computeDigest(data);
    const vaultId = this.generateId();

    const stored = await this.storage.put(vaultId, filename, data);
    if (!stored.ok) {
      await this.auditLog.record({
        operation: 'ingest',
        vaultId,
        filename,
        contentDigest,
        status: 'failed',
        error: 'Upload to blob store failed',
      });
      return failure({ kind: 'storage', message: 'Failed to store file in vault' });
    }

    const record = await this.auditLog.record({
      operation: 'ingest',
      vaultId,
      filename,
      contentDigest,
      status: 'success',
    });

    this.logger.info({ vaultId, filename, size: data.length }, 'File ingested');

    return success({
      vaultId,
      filename,
      contentDigest,
      size: data.length,
      createdAt: record.timestamp,
    });
  }

  /** Metadata from the first successful ingest record for `vaultId`. */
  async getMetadata(vaultId: string): Promise<VaultResult<VaultMetadata>> {
    if (!isValidVaultId(vaultId)) {
      return failure({ kind: 'validation', message: 'Invalid vault ID format' });
    }

    const record = await this.auditLog.findIngestRecord(vaultId);
    if (!record) {
      return failure({ kind: 'not_found', message: 'Vault ID not found' });
    }

    return success({
      vaultId,
      filename: record.filename,
      contentDigest: record.content_digest,
      createdAt: record.timestamp,
      status: record.status,
    });
  }

  async retrieve(vaultId: string, filename?: string): Promise<VaultResult<RetrievedBlob>> {
    if (!isValidVaultId(vaultId)) {
      return failure({ kind: 'validation', message: 'Invalid vault ID format' });
    }
    if (!filename) {
      return failure({ kind: 'validation', message: 'Filename required for file retrieval' });
    }
    if (!isSanitizedFilename(filename)) {
      return failure({ kind: 'validation', message: 'Invalid filename' });
    }

    const fetched = await this.storage.get(vaultId, filename);
    if (!fetched.ok) {
      await this.auditLog.record({
        operation: 'retrieve',
        vaultId,
        filename,
        contentDigest: null,
        status: 'failed',
        error: fetched.reason === 'not_found' ? 'File not found in vault' : 'Blob store read failed',
      });
      return failure({ kind: 'not_found', message: 'File not found in vault' });
    }

    const contentDigest = computeDigest(fetched.data);
    await this.auditLog.record({
      operation: 'retrieve',
      vaultId,
      filename,
      contentDigest,
      status: 'success',
    });

    return success({ vaultId, filename, data: fetched.data, contentDigest });
  }

  async verify(vaultId: string, filename?: string): Promise<VaultResult<VerificationReport>> {
    if (!isValidVaultId(vaultId)) {
      return failure({ kind: 'validation', message: 'Invalid vault ID format' });
    }
    if (!filename) {
      return failure({ kind: 'validation', message: 'Filename required for verification' });
    }
    if (!isSanitizedFilename(filename)) {
      return failure({ kind: 'validation', message: 'Invalid filename' });
    }

    const fetched = await this.storage.get(vaultId, filename);
    if (!fetched.ok) {
      return failure({ kind: 'not_found', message: 'File not found in vault' });
    }
    const currentDigest = computeDigest(fetched.data);

    const record = await this.auditLog.findIngestRecord(vaultId, filename);
    if (!record) {
      return failure({ kind: 'not_found', message: 'Original digest not found in audit log' });
    }

    const match = record.content_digest === currentDigest;
    if (!match) {
      this.logger.warn(
        { vaultId, filename, originalDigest: record.content_digest, currentDigest },
        'Integrity mismatch detected'
      );
    }

    return success({
      vaultId,
      filename,
      originalDigest: record.content_digest,
      currentDigest,
      match,
      size: fetched.data.length,
    });
  }
}
