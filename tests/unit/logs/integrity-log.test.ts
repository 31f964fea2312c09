import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { IntegrityLog } from '@/logs/integrity-log.js';

import { silentLogger } from '../../helpers/test-config.js';

const DIGEST = 'a'.repeat(64);

describe('IntegrityLog', () => {
  let testDir: string;
  let logPath: string;
  let integrityLog: IntegrityLog;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'vault-integrity-test-'));
    logPath = join(testDir, 'integrity_log.jsonl');
    integrityLog = new IntegrityLog(logPath, silentLogger);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should tag each record with its check type', async () => {
    await integrityLog.recordCheck({
      vault_id: 'v1',
      filename: 'a.txt',
      status: 'verified',
      original_digest: DIGEST,
      current_digest: DIGEST,
      match: true,
    });
    await integrityLog.recordSummary({
      total_files: 1,
      verified_files: 1,
      failed_files: 0,
      duration_seconds: 0.01,
    });
    await integrityLog.recordFatal('disk on fire');

    const records = await integrityLog.readAll();
    expect(records.map((r) => r.check_type)).toEqual([
      'integrity_verification',
      'integrity_summary',
      'fatal_error',
    ]);
    expect(records[2]).toEqual({
      check_type: 'fatal_error',
      timestamp: expect.any(String),
      error: 'disk on fire',
    });
  });

  it('should prune 1200 records down to the most recent 1000', async () => {
    const lines = Array.from({ length: 1200 }, (_, index) =>
      JSON.stringify({
        check_type: 'integrity_verification',
        timestamp: new Date(Date.UTC(2026, 0, 1, 0, 0, index)).toISOString(),
        vault_id: `vault-${index}`,
        filename: 'a.txt',
        status: 'verified',
        original_digest: DIGEST,
        current_digest: DIGEST,
        match: true,
      })
    );
    await writeFile(logPath, `${lines.join('\n')}\n`);

    const dropped = await integrityLog.prune(1000);

    expect(dropped).toBe(200);
    const records = await integrityLog.readAll();
    expect(records).toHaveLength(1000);
    const vaultIds = records.map((r) => (r.check_type === 'integrity_verification' ? r.vault_id : ''));
    expect(vaultIds[0]).toBe('vault-200');
    expect(vaultIds[999]).toBe('vault-1199');
    expect(vaultIds).toEqual(Array.from({ length: 1000 }, (_, index) => `vault-${index + 200}`));
  });
});
