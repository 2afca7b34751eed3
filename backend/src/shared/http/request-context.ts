/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Each provider (tenant) is served on its own subdomain. The tenant key is
 *   read from the Host header once per request, together with a requestId that
 *   ties log lines and audit rows of one request together.
 *
 * HOST → tenantKey:
 *   acme.localhost:3000        → acme
 *   acme.accountdesk.example   → acme
 *   localhost, accountdesk.example, missing Host → null
 *
 * RULES:
 * - A null tenantKey is not an error here; tenant-scoped routes reject it
 *   (TenantErrors.tenantKeyMissing), /health does not care.
 */

import { randomUUID } from 'node:crypto';
import type { FastifyInstance } from 'fastify';

export type RequestContext = {
  requestId: string;
  host: string | null;
  tenantKey: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

/** Lowercased host without the port. */
export function normalizeHost(raw: string | undefined): string | null {
  const host = raw?.trim().toLowerCase().replace(/:\d+$/, '');
  return host ? host : null;
}

export function tenantKeyFromHost(host: string | null): string | null {
  if (host === null) return null;

  const labels = host.split('.');
  const isLocal = labels.length === 2 && labels[1] === 'localhost';
  const hasSubdomain = labels.length >= 3;

  const key = isLocal || hasSubdomain ? labels[0] : undefined;
  return key ? key : null;
}

export function registerRequestContext(app: FastifyInstance): void {
  // Fastify wants the property declared up front; the hook fills it per request.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  app.addHook('onRequest', async (req) => {
    const host = normalizeHost(req.headers.host);
    req.requestContext = { requestId: randomUUID(), host, tenantKey: tenantKeyFromHost(host) };
  });
}
