// Integrity-check trail written by the periodic auditor.

import type { FastifyBaseLogger } from 'fastify';

import { JsonlFile } from './jsonl-file.js';
import { IntegrityLogRecordSchema } from './types.js';
import type {
  IntegrityCheckRecord,
  IntegrityFatalRecord,
  IntegrityLogRecord,
  IntegritySummaryRecord,
} from './types.js';

type WithoutMeta<T> = Omit<T, 'check_type' | 'timestamp'>;

export class IntegrityLog {
  private readonly file: JsonlFile<IntegrityLogRecord>;

  constructor(path: string, logger: FastifyBaseLogger) {
    this.file = new JsonlFile({ path, schema: IntegrityLogRecordSchema, logger });
  }

  get path(): string {
    return this.file.path;
  }

  async recordCheck(check: WithoutMeta<IntegrityCheckRecord>): Promise<IntegrityCheckRecord> {
    const record: IntegrityCheckRecord = {
      check_type: 'integrity_verification',
      timestamp: new Date().toISOString(),
      ...check,
    };
    await this.file.append(record);
    return record;
  }

  async recordSummary(
    summary: WithoutMeta<IntegritySummaryRecord>
  ): Promise<IntegritySummaryRecord> {
    const record: IntegritySummaryRecord = {
      check_type: 'integrity_summary',
      timestamp: new Date().toISOString(),
      ...summary,
    };
    await this.file.append(record);
    return record;
  }

  async recordFatal(error: string): Promise<IntegrityFatalRecord> {
    const record: IntegrityFatalRecord = {
      check_type: 'fatal_error',
      timestamp: new Date().toISOString(),
      error,
    };
    await this.file.append(record);
    return record;
  }

  async readAll(): Promise<IntegrityLogRecord[]> {
    return this.file.readAll();
  }

  /**
   * Drop the oldest lines so at most `retention` remain.
   *
   * @returns Number of lines dropped
   */
  async prune(retention: number): Promise<number> {
    return this.file.pruneToLast(retention);
  }
}
