/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Every failure answers `{ error: { code, message } }`; meta and stacks only
 *   ever reach the log.
 *
 * MAPPING (toHttpError):
 *   AppError            → its own status/code/message
 *   RateLimitError      → 429 RATE_LIMITED
 *   ZodError            → 400 (a controller parsed without parseBody)
 *   Fastify 4xx         → same status, VALIDATION_ERROR (bad JSON, wrong content type)
 *   anything else       → 500 INTERNAL, logged at error level
 *
 * RULES:
 * - Sensitive meta keys are redacted before logging.
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { AppError, type AppErrorCode } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';
import { errorFields } from '../logger/logger';

const REDACTED_KEYS = new Set([
  'password',
  'password1',
  'password2',
  'passwordHash',
  'sessionId',
  'token',
  'secret',
]);

export function redactMeta(meta: Record<string, unknown> | undefined) {
  if (!meta) return undefined;
  return Object.fromEntries(
    Object.entries(meta).map(([key, value]) => [
      key,
      REDACTED_KEYS.has(key) ? '[REDACTED]' : value,
    ]),
  );
}

export type HttpError = {
  status: number;
  code: AppErrorCode;
  message: string;
  /** Log line name and fields; never sent to the client. */
  log: { level: 'info' | 'warn' | 'error'; event: string; fields: Record<string, unknown> };
};

export function toHttpError(err: unknown): HttpError {
  if (err instanceof AppError) {
    return {
      status: err.status,
      code: err.code,
      message: err.message,
      log: {
        level: 'warn',
        event: 'app_error',
        fields: { code: err.code, meta: redactMeta(err.meta) },
      },
    };
  }

  if (err instanceof RateLimitError) {
    return {
      status: 429,
      code: 'RATE_LIMITED',
      message: 'Too many requests. Try again later.',
      log: {
        level: 'warn',
        event: 'rate_limit',
        fields: { key: err.key, limit: err.limit, windowSeconds: err.windowSeconds },
      },
    };
  }

  if (err instanceof ZodError) {
    return {
      status: 400,
      code: 'VALIDATION_ERROR',
      message: 'Invalid request',
      log: { level: 'warn', event: 'validation_error', fields: { issues: err.issues.length } },
    };
  }

  if (isFastifyError(err) && isClientStatus(err.statusCode)) {
    return {
      status: err.statusCode,
      code: 'VALIDATION_ERROR',
      message: err.message,
      log: { level: 'warn', event: 'client_error', fields: { fastifyCode: err.code } },
    };
  }

  return {
    status: 500,
    code: 'INTERNAL',
    message: 'Internal server error',
    log: {
      level: 'error',
      event: 'unhandled_error',
      fields: errorFields(err),
    },
  };
}

function isClientStatus(status: number | undefined): status is number {
  return status !== undefined && status >= 400 && status < 500;
}

function isFastifyError(err: unknown): err is FastifyError {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err, req, reply) => {
    const mapped = toHttpError(err);
    withRequestContext(req).log(mapped.log.level, mapped.log.event, {
      flow: 'http.error',
      status: mapped.status,
      responseMessage: mapped.message,
      ...mapped.log.fields,
    });

    return reply
      .status(mapped.status)
      .send({ error: { code: mapped.code, message: mapped.message } });
  });

  app.setNotFoundHandler((req, reply) => {
    withRequestContext(req).info('route_not_found', {
      flow: 'http.error',
      method: req.method,
      url: req.url,
    });
    return reply.status(404).send({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });
}
