import type { Membership } from '../membership.types';
import { MembershipErrors } from '../membership.errors';

/**
 * Pure guard used when provisioning a user into a tenant: an existing
 * SUSPENDED membership is never silently reused.
 */
export function assertMembershipNotSuspended(membership: Pick<Membership, 'id' | 'status'>): void {
  if (membership.status !== 'SUSPENDED') return;
  throw MembershipErrors.membershipSuspended({ membershipId: membership.id });
}
