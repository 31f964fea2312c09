// Audit log: append-only record of every ingest and retrieve.
//
// This file is the single source of truth for what was ingested and with which
// digest. Lookups are linear scans behind a small interface so an indexed store
// can replace it without touching callers.

import type { FastifyBaseLogger } from 'fastify';

import { JsonlFile } from './jsonl-file.js';
import { AuditRecordSchema } from './types.js';
import type { AuditOperation, AuditRecord, IngestRecord } from './types.js';

/** Read side used by the vault service and the integrity auditor. */
export interface AuditLookup {
  /** First successful ingest record for `vaultId` (and `filename`, when given). */
  findIngestRecord(vaultId: string, filename?: string): Promise<IngestRecord | undefined>;
  /** Every successful ingest record, in log order. */
  listIngested(): Promise<IngestRecord[]>;
}

export interface AuditEvent {
  operation: AuditOperation;
  vaultId: string;
  filename: string;
  contentDigest: string | null;
  status: AuditRecord['status'];
  error?: string;
}

export function isIngestRecord(record: AuditRecord): record is IngestRecord {
  return (
    record.operation === 'ingest' && record.status === 'success' && record.content_digest !== null
  );
}

export class AuditLog implements AuditLookup {
  private readonly file: JsonlFile<AuditRecord>;

  constructor(path: string, logger: FastifyBaseLogger) {
    this.file = new JsonlFile({ path, schema: AuditRecordSchema, logger });
  }

  get path(): string {
    return this.file.path;
  }

  async record(event: AuditEvent): Promise<AuditRecord> {
    const record: AuditRecord = {
      timestamp: new Date().toISOString(),
      operation: event.operation,
      filename: event.filename,
      content_digest: event.contentDigest,
      vault_id: event.vaultId,
      status: event.status,
      ...(event.error !== undefined && { error: event.error }),
    };
    await this.file.append(record);
    return record;
  }

  async findIngestRecord(vaultId: string, filename?: string): Promise<IngestRecord | undefined> {
    const records = await this.file.readAll();
    return records.find(
      (record): record is IngestRecord =>
        isIngestRecord(record) &&
        record.vault_id === vaultId &&
        (filename === undefined || record.filename === filename)
    );
  }

  async listIngested(): Promise<IngestRecord[]> {
    const records = await this.file.readAll();
    return records.filter(isIngestRecord);
  }

  async readAll(): Promise<AuditRecord[]> {
    return this.file.readAll();
  }
}
