import * as Sentry from '@sentry/node';
import type { FastifyBaseLogger } from 'fastify';

import type { Config } from './config/index.js';

/**
 * Initialize Sentry error tracking when a DSN is configured. Without one,
 * Sentry calls elsewhere are no-ops.
 */
export function initSentry(sentry: Config['sentry'], logger: FastifyBaseLogger): void {
  if (!sentry) {
    logger.debug('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn: sentry.dsn,
    environment: sentry.environment,
    tracesSampleRate: sentry.tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment: sentry.environment }, 'Sentry initialized');
}

// Re-export Sentry for use in error handler and the audit job
export { Sentry };
