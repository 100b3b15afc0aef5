/**
 * Logger
 *
 * Pino-based structured logger shared by every workspace.
 * Console progress lines are written by the CLI; this is for diagnostics.
 */

import { pino } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Target descriptors carry credentials
  redact: {
    paths: ['secretAccessKey', '*.secretAccessKey', '*.credentials'],
    censor: '[redacted]',
  },
  base: {
    service: 'skyrelay',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
      destination: 2,
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
