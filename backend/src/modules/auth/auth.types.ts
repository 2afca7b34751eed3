/**
 * src/modules/auth/auth.types.ts
 *
 * AuthResult is the body of a successful POST /auth/login. It never carries
 * password material.
 */

import type { MembershipRole } from '../memberships/membership.types';
import type { UserSummary } from '../users';

/** auth_identities.provider; password is the only sign-in method. */
export type AuthProvider = 'password';

export type AuthResult = {
  status: 'AUTHENTICATED';
  user: UserSummary;
  membership: { id: string; role: MembershipRole };
};
