#!/usr/bin/env node
// Integrity audit job. Meant to be run by an external timer (cron, systemd
// timer), e.g. hourly:
//
//   0 * * * *  cd /srv/vault-relay && node dist/audit.js
//
// Exit code 0 for a completed or aborted run, 1 on a fatal error.

import { pino } from 'pino';

import { loadConfig } from './config/index.js';
import { initSentry, Sentry } from './instrument.js';
import { IntegrityAuditor } from './integrity/index.js';
import { buildLoggerOptions } from './logger.js';
import { AuditLog, IntegrityLog } from './logs/index.js';
import { createBlobStore } from './storage/index.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = pino(buildLoggerOptions(config.logging));
  initSentry(config.sentry, logger);

  const auditor = new IntegrityAuditor({
    storage: createBlobStore(config.storage, logger),
    auditLog: new AuditLog(config.vault.auditLogPath, logger),
    integrityLog: new IntegrityLog(config.vault.integrityLogPath, logger),
    logger,
    retention: config.vault.integrityRetention,
  });

  const report = await auditor.runAndPrune();
  if (report.run.outcome === 'fatal') {
    Sentry.captureException(new Error(report.run.error));
    await Sentry.flush(2000);
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
