/**
 * backend/src/modules/auth/policies/login-membership-gating.policy.ts
 *
 * Pure gate between "password is right" and "session is issued":
 *   no membership on this tenant → no_membership (403)
 *   SUSPENDED                    → suspended (403)
 *
 * The login flow records `reason` in the failed-login audit, so the gate
 * returns a verdict instead of throwing.
 */

import { AuthErrors } from '../auth.errors';
import type { AppError } from '../../../shared/http/errors';
import type { MembershipStatus } from '../../memberships/membership.types';

export type LoginRejectionReason = 'no_membership' | 'suspended';

export type LoginMembershipVerdict<M> =
  | { allowed: true; membership: M }
  | { allowed: false; reason: LoginRejectionReason; error: AppError };

export function checkLoginMembership<M extends { status: MembershipStatus }>(
  membership: M | undefined,
): LoginMembershipVerdict<M> {
  if (membership === undefined) {
    return { allowed: false, reason: 'no_membership', error: AuthErrors.noAccess() };
  }

  return membership.status === 'SUSPENDED'
    ? { allowed: false, reason: 'suspended', error: AuthErrors.accountSuspended() }
    : { allowed: true, membership };
}
