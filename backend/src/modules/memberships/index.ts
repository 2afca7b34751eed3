/**
 * backend/src/modules/memberships/index.ts
 *
 * Memberships are looked up by (tenantId, userId) at login and when provisioning
 * account users, and listed per user before another user's details are edited.
 * Import from here, never from ./queries or ./dal directly.
 */

export { getMembershipByTenantAndUser, listMembershipsOfUser } from './queries/membership.queries';
export { assertMembershipNotSuspended } from './policies/membership-access.policy';
export { MembershipRepo } from './dal/membership.repo';
export type { Membership, MembershipRole, MembershipStatus } from './membership.types';
