/**
 * backend/src/shared/logger/logger.ts
 *
 * One winston logger, JSON lines on stdout. Request handlers log through
 * withRequestContext(req) so every line carries requestId and tenant.
 * Errors go in through errorFields(err): winston's json format drops the
 * fields of an Error nested in meta.
 */

import winston from 'winston';

const { combine, timestamp, json } = winston.format;

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: combine(timestamp(), json()),
  defaultMeta: {
    service: process.env.SERVICE_NAME ?? 'account-desk-backend',
    env: process.env.NODE_ENV ?? 'development',
  },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;

export function errorFields(err: unknown): { error: string; stack?: string } {
  return err instanceof Error ? { error: err.message, stack: err.stack } : { error: String(err) };
}
