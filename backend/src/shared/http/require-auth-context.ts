/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * Controller guard for every page behind a login:
 *   anonymous   → 401 "Authentication required"
 *   wrong role  → 403 "Insufficient role."
 * No DB access: the role checked is the one stored in the session.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { SessionActor } from './auth-context';
import type { MembershipRole } from '../../modules/memberships/membership.types';

export type { SessionActor };

export function requireSession(
  req: FastifyRequest,
  opts: Readonly<{ role?: MembershipRole }> = {},
): SessionActor {
  const actor = req.authContext;
  if (actor === null) throw AppError.unauthorized('Authentication required');

  if (opts.role !== undefined && actor.role !== opts.role) {
    throw AppError.forbidden('Insufficient role.');
  }
  return actor;
}
