/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Turns the `sid` cookie into req.authContext before any route runs.
 * - Routes decide whether a session is required (requireSession); this hook never throws.
 *
 * RULES:
 * - Registered after registerRequestContext and registerAuthContext.
 * - A session is bound to the host it was created on: when session.tenantKey
 *   differs from the request's tenantKey the cookie is ignored, so a cookie from
 *   acme.localhost is anonymous on globex.localhost.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SessionStore } from './session.store';
import { SESSION_COOKIE_NAME } from './session.types';

/** Value of the session cookie in a raw `Cookie` header, if present. */
export function readSessionId(cookieHeader: string | undefined): string | null {
  if (!cookieHeader) return null;

  for (const part of cookieHeader.split(';')) {
    const [name, ...rest] = part.split('=');
    if (name?.trim() !== SESSION_COOKIE_NAME) continue;

    const value = rest.join('=').trim();
    return value.length > 0 ? value : null;
  }
  return null;
}

export function registerSessionMiddleware(app: FastifyInstance, sessionStore: SessionStore): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const sessionId = readSessionId(req.headers.cookie);
    if (!sessionId) return;

    const session = await sessionStore.get(sessionId);
    if (!session || session.tenantKey !== req.requestContext.tenantKey) return;

    req.authContext = {
      sessionId,
      userId: session.userId,
      tenantId: session.tenantId,
      membershipId: session.membershipId,
      role: session.role,
    };
  });
}
