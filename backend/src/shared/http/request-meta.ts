/**
 * backend/src/shared/http/request-meta.ts
 *
 * WHY:
 * - Services need the same request facts for tenant resolution, logs and audits.
 *   Controllers build them once with requestMeta(req).
 */

import type { FastifyRequest } from 'fastify';

export type RequestMeta = Readonly<{
  tenantKey: string | null;
  host: string | null;
  requestId: string;
  ip: string;
  userAgent: string | null;
}>;

export function requestMeta(req: FastifyRequest): RequestMeta {
  return {
    tenantKey: req.requestContext.tenantKey,
    host: req.requestContext.host,
    requestId: req.requestContext.requestId,
    ip: req.ip,
    userAgent: req.headers['user-agent'] ?? null,
  };
}
