import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { AuditLog } from '@/logs/audit-log.js';

import { silentLogger } from '../../helpers/test-config.js';

const VAULT_A = '0f8fad5b-d9cb-469f-a165-70867728950e';
const VAULT_B = '7c9e6679-7425-40de-944b-e07fc1f90ae7';
const DIGEST_1 = '1'.repeat(64);
const DIGEST_2 = '2'.repeat(64);

describe('AuditLog', () => {
  let testDir: string;
  let auditLog: AuditLog;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'vault-audit-test-'));
    auditLog = new AuditLog(join(testDir, 'vault_log.jsonl'), silentLogger);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should append records with a timestamp and snake_case fields', async () => {
    const record = await auditLog.record({
      operation: 'ingest',
      vaultId: VAULT_A,
      filename: 'note.txt',
      contentDigest: DIGEST_1,
      status: 'success',
    });

    expect(record).toEqual({
      timestamp: expect.any(String),
      operation: 'ingest',
      filename: 'note.txt',
      content_digest: DIGEST_1,
      vault_id: VAULT_A,
      status: 'success',
    });
    expect(new Date(record.timestamp).toISOString()).toBe(record.timestamp);
    expect(await auditLog.readAll()).toEqual([record]);
  });

  it('should include the error only when one is given', async () => {
    const record = await auditLog.record({
      operation: 'retrieve',
      vaultId: VAULT_A,
      filename: 'note.txt',
      contentDigest: null,
      status: 'failed',
      error: 'File not found in vault',
    });

    expect(record.error).toBe('File not found in vault');
    expect(record.content_digest).toBeNull();
  });

  describe('findIngestRecord()', () => {
    beforeEach(async () => {
      await auditLog.record({
        operation: 'ingest',
        vaultId: VAULT_A,
        filename: 'note.txt',
        contentDigest: DIGEST_2,
        status: 'failed',
        error: 'Upload to blob store failed',
      });
      await auditLog.record({
        operation: 'retrieve',
        vaultId: VAULT_A,
        filename: 'note.txt',
        contentDigest: DIGEST_2,
        status: 'success',
      });
      await auditLog.record({
        operation: 'ingest',
        vaultId: VAULT_A,
        filename: 'note.txt',
        contentDigest: DIGEST_1,
        status: 'success',
      });
      await auditLog.record({
        operation: 'ingest',
        vaultId: VAULT_A,
        filename: 'note.txt',
        contentDigest: DIGEST_2,
        status: 'success',
      });
    });

    it('should return the first successful ingest for the vault id', async () => {
      const record = await auditLog.findIngestRecord(VAULT_A);
      expect(record?.content_digest).toBe(DIGEST_1);
    });

    it('should also match on filename when given', async () => {
      expect((await auditLog.findIngestRecord(VAULT_A, 'note.txt'))?.content_digest).toBe(
        DIGEST_1
      );
      expect(await auditLog.findIngestRecord(VAULT_A, 'other.txt')).toBeUndefined();
    });

    it('should return undefined for an unknown vault id', async () => {
      expect(await auditLog.findIngestRecord(VAULT_B)).toBeUndefined();
    });
  });

  describe('listIngested()', () => {
    it('should list only successful ingests in log order', async () => {
      await auditLog.record({
        operation: 'ingest',
        vaultId: VAULT_B,
        filename: 'b.bin',
        contentDigest: DIGEST_2,
        status: 'success',
      });
      await auditLog.record({
        operation: 'ingest',
        vaultId: VAULT_A,
        filename: 'a.bin',
        contentDigest: DIGEST_1,
        status: 'failed',
      });
      await auditLog.record({
        operation: 'ingest',
        vaultId: VAULT_A,
        filename: 'a.bin',
        contentDigest: DIGEST_1,
        status: 'success',
      });

      const catalog = await auditLog.listIngested();
      expect(catalog.map((r) => [r.vault_id, r.filename])).toEqual([
        [VAULT_B, 'b.bin'],
        [VAULT_A, 'a.bin'],
      ]);
    });

    it('should return an empty catalog when the log does not exist', async () => {
      expect(await auditLog.listIngested()).toEqual([]);
    });
  });
});
