// Periodic integrity auditor.
//
// A single batch run: probe the blob store, load the catalog of successful
// ingests from the audit log, re-hash every stored blob in catalog order and
// record one integrity-check line per file plus a run summary. Holds no state
// between runs; an external timer invokes it.

import type { FastifyBaseLogger } from 'fastify';

import { computeDigest } from './digest.js';
import type { AuditLookup } from '../logs/audit-log.js';
import type { IntegrityLog } from '../logs/integrity-log.js';
import type { IngestRecord, IntegrityCheckRecord } from '../logs/types.js';
import type { BlobStore } from '../storage/types.js';

export interface IntegrityAuditorOptions {
  storage: BlobStore;
  auditLog: AuditLookup;
  integrityLog: IntegrityLog;
  logger: FastifyBaseLogger;
  /** Integrity-trail lines kept after each run */
  retention: number;
}

export interface CompletedAuditRun {
  outcome: 'completed';
  total_files: number;
  verified_files: number;
  failed_files: number;
  duration_seconds: number;
  results: IntegrityCheckRecord[];
}

export interface AbortedAuditRun {
  outcome: 'aborted';
  reason: 'storage_unreachable';
}

export interface FatalAuditRun {
  outcome: 'fatal';
  error: string;
}

export type AuditRunReport = CompletedAuditRun | AbortedAuditRun;

export interface ScheduledAuditReport {
  run: AuditRunReport | FatalAuditRun;
  /** Lines dropped from the integrity trail by retention */
  pruned: number;
}

export class IntegrityAuditor {
  private readonly storage: BlobStore;
  private readonly auditLog: AuditLookup;
  private readonly integrityLog: IntegrityLog;
  private readonly logger: FastifyBaseLogger;
  private readonly retention: number;

  constructor(options: IntegrityAuditorOptions) {
    this.storage = options.storage;
    this.auditLog = options.auditLog;
    this.integrityLog = options.integrityLog;
    this.logger = options.logger;
    this.retention = options.retention;
  }

  async run(): Promise<AuditRunReport> {
    const startedAt = performance.now();
    this.logger.info('Starting integrity check');

    if (!(await this.storage.healthy())) {
      this.logger.error('Blob store unreachable, integrity check aborted');
      return { outcome: 'aborted', reason: 'storage_unreachable' };
    }

    const catalog = await this.loadCatalog();
    this.logger.info({ files: catalog.length }, 'Checking integrity of vault files');

    const results: IntegrityCheckRecord[] = [];
    let verified = 0;
    for (const entry of catalog) {
      const result = await this.checkEntry(entry);
      results.push(result);
      if (result.status === 'verified') {
        verified++;
      }
    }

    const durationSeconds = (performance.now() - startedAt) / 1000;
    const summary = await this.integrityLog.recordSummary({
      total_files: catalog.length,
      verified_files: verified,
      failed_files: catalog.length - verified,
      duration_seconds: durationSeconds,
    });

    this.logger.info(
      {
        verified: summary.verified_files,
        failed: summary.failed_files,
        durationSeconds: summary.duration_seconds,
      },
      'Integrity check completed'
    );
    if (summary.failed_files > 0) {
      this.logger.warn({ failed: summary.failed_files }, 'Files failed integrity check');
    }

    return {
      outcome: 'completed',
      total_files: summary.total_files,
      verified_files: summary.verified_files,
      failed_files: summary.failed_files,
      duration_seconds: summary.duration_seconds,
      results,
    };
  }

  /**
   * Run once, record a fatal-error line if the run itself throws, then prune
   * the integrity trail whatever the outcome.
   */
  async runAndPrune(): Promise<ScheduledAuditReport> {
    let run: AuditRunReport | FatalAuditRun;
    try {
      run = await this.run();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ err: message }, 'Fatal error in integrity check');
      await this.integrityLog.recordFatal(message);
      run = { outcome: 'fatal', error: message };
    }

    const pruned = await this.integrityLog.prune(this.retention);
    if (pruned > 0) {
      this.logger.info(
        { pruned, kept: this.retention },
        'Pruned integrity log to most recent entries'
      );
    }

    return { run, pruned };
  }

  /** Successful ingests; an unreadable audit log counts as an empty catalog. */
  private async loadCatalog(): Promise<IngestRecord[]> {
    try {
      return await this.auditLog.listIngested();
    } catch (error) {
      this.logger.warn(
        { err: error instanceof Error ? error.message : 'Unknown error' },
        'Audit log unreadable, treating catalog as empty'
      );
      return [];
    }
  }

  private async checkEntry(entry: IngestRecord): Promise<IntegrityCheckRecord> {
    const { vault_id: vaultId, filename, content_digest: originalDigest } = entry;
    this.logger.debug({ vaultId, filename }, 'Verifying file');

    try {
      const fetched = await this.storage.get(vaultId, filename);
      if (!fetched.ok) {
        this.logger.error({ vaultId, filename, reason: fetched.reason }, 'Integrity check failed');
        return await this.integrityLog.recordCheck({
          vault_id: vaultId,
          filename,
          status: 'failed',
          original_digest: originalDigest,
          current_digest: null,
          match: null,
          error:
            fetched.reason === 'not_found'
              ? 'File not found in blob store'
              : `Blob store read failed: ${fetched.message}`,
        });
      }

      const currentDigest = computeDigest(fetched.data);
      if (currentDigest === originalDigest) {
        return await this.integrityLog.recordCheck({
          vault_id: vaultId,
          filename,
          status: 'verified',
          original_digest: originalDigest,
          current_digest: currentDigest,
          match: true,
        });
      }

      this.logger.error(
        { vaultId, filename, originalDigest, currentDigest },
        'Integrity check failed: digest mismatch'
      );
      return await this.integrityLog.recordCheck({
        vault_id: vaultId,
        filename,
        status: 'corrupted',
        original_digest: originalDigest,
        current_digest: currentDigest,
        match: false,
        error: 'Digest mismatch',
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ vaultId, filename, err: message }, 'Error verifying file');
      return this.integrityLog.recordCheck({
        vault_id: vaultId,
        filename,
        status: 'error',
        original_digest: originalDigest,
        current_digest: null,
        match: null,
        error: message,
      });
    }
  }
}
