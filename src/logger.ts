import type { LoggerOptions } from 'pino';

import type { Config } from './config/index.js';

/**
 * Pino options shared by the HTTP server and the auditor CLI.
 * Pretty printing goes through the pino-pretty transport.
 */
export function buildLoggerOptions(logging: Config['logging']): LoggerOptions {
  return {
    level: logging.level,
    transport: logging.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  };
}
