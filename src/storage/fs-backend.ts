// Filesystem blob store.
//
// Stores each blob at `<dataDir>/<vault_id>/<filename>` with owner-only
// permissions. Simple, zero-dependency, works without an object store.

import { access, constants, mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';

import { withTimeout } from './timeout.js';
import { isSafeKeySegment } from './types.js';
import type { BlobStore, GetResult, PutResult } from './types.js';
import { isNotFoundError } from '../logs/jsonl-file.js';

export interface FsBlobStoreOptions {
  dataDir: string;
  timeoutMs: number;
  logger: FastifyBaseLogger;
}

export class FsBlobStore implements BlobStore {
  private readonly dataDir: string;
  private readonly timeoutMs: number;
  private readonly logger: FastifyBaseLogger;

  constructor(options: FsBlobStoreOptions) {
    this.dataDir = options.dataDir;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  async put(vaultId: string, filename: string, data: Buffer): Promise<PutResult> {
    const filePath = this.resolvePath(vaultId, filename);
    if (!filePath) {
      return { ok: false, reason: 'storage_error', message: 'Invalid storage key' };
    }

    try {
      await withTimeout(
        (async () => {
          await mkdir(join(this.dataDir, vaultId), { recursive: true, mode: 0o700 });
          await writeFile(filePath, data, { mode: 0o600 });
        })(),
        this.timeoutMs,
        'put'
      );
      return { ok: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ err: message, vaultId, filename }, 'Blob store write failed');
      return { ok: false, reason: 'storage_error', message };
    }
  }

  async get(vaultId: string, filename: string): Promise<GetResult> {
    const filePath = this.resolvePath(vaultId, filename);
    if (!filePath) {
      return { ok: false, reason: 'not_found' };
    }

    try {
      const data = await withTimeout(readFile(filePath), this.timeoutMs, 'get');
      return { ok: true, data };
    } catch (error) {
      if (isNotFoundError(error)) {
        return { ok: false, reason: 'not_found' };
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ err: message, vaultId, filename }, 'Blob store read failed');
      return { ok: false, reason: 'storage_error', message };
    }
  }

  async healthy(): Promise<boolean> {
    try {
      await withTimeout(
        (async () => {
          await mkdir(this.dataDir, { recursive: true });
          await access(this.dataDir, constants.R_OK | constants.W_OK);
        })(),
        this.timeoutMs,
        'healthy'
      );
      return true;
    } catch (error) {
      this.logger.error(
        { err: error instanceof Error ? error.message : 'Unknown error', dataDir: this.dataDir },
        'Blob store connectivity check failed'
      );
      return false;
    }
  }

  /** Path for a key, or null when a segment could escape its directory. */
  private resolvePath(vaultId: string, filename: string): string | null {
    if (!isSafeKeySegment(vaultId) || !isSafeKeySegment(filename)) {
      return null;
    }
    return join(this.dataDir, vaultId, filename);
  }
}
