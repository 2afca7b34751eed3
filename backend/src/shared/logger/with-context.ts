/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Request logs carry requestId, tenantKey and the signed-in actor so one
 *   page view can be traced end to end.
 *
 * HOW TO USE:
 * - `withRequestContext(req).info('msg', { flow: '...' })`
 * - Fields given per call win over the bound ones (winston child semantics).
 */

import type { FastifyRequest } from 'fastify';
import { logger, type Logger } from './logger';

export function withRequestContext(req: FastifyRequest): Logger {
  const { requestContext: rc, authContext: ac } = req;

  return logger.child({
    requestId: rc?.requestId,
    tenantKey: rc?.tenantKey,
    host: rc?.host,
    userId: ac?.userId ?? null,
    membershipId: ac?.membershipId ?? null,
    role: ac?.role ?? null,
  });
}
