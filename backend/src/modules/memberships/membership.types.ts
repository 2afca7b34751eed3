/**
 * backend/src/modules/memberships/membership.types.ts
 *
 * WHY:
 * - A Membership connects a User to a Tenant (provider).
 * - Defines role (PROVIDER/CLIENT) and status (ACTIVE/SUSPENDED).
 * - Access is decided by membership, never by user alone.
 *
 * ROLES:
 * - PROVIDER: provider staff; manages every account of the tenant.
 * - CLIENT: an account user; sees only the accounts it belongs to.
 */

export type MembershipId = string;

export type MembershipRole = 'PROVIDER' | 'CLIENT';

export type MembershipStatus = 'ACTIVE' | 'SUSPENDED';

export type Membership = {
  id: MembershipId;
  tenantId: string;
  userId: string;

  role: MembershipRole;
  status: MembershipStatus;

  createdAt: Date;
  updatedAt: Date;
};
