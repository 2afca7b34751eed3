/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - `req.authContext` is the signed-in actor, or null for an anonymous request.
 *   There is no half-filled state: the session middleware either sets every
 *   field from a valid session or leaves it null.
 *
 * FLOW:
 *   registerAuthContext      → null on every request
 *   registerSessionMiddleware → SessionActor when the `sid` cookie resolves
 *   requireSession(req)       → 401/403 guard in controllers
 */

import type { FastifyInstance } from 'fastify';
import type { MembershipRole } from '../../modules/memberships/membership.types';

export type SessionActor = Readonly<{
  sessionId: string;
  userId: string;
  tenantId: string;
  membershipId: string;
  role: MembershipRole;
}>;

declare module 'fastify' {
  interface FastifyRequest {
    authContext: SessionActor | null;
  }
}

export function registerAuthContext(app: FastifyInstance): void {
  app.decorateRequest('authContext', null);

  // reset per request; decorators on the prototype must not carry state over
  app.addHook('onRequest', async (req) => {
    req.authContext = null;
  });
}
