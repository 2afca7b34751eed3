/**
 * src/modules/_shared/use-cases/provision-user-to-tenant.usecase.ts
 *
 * WHY:
 * - Account creation (first owner), account-user creation and the dev seed all
 *   need "this email is a member of this provider" to hold afterwards.
 *
 * BEHAVIOUR:
 *   user by email      missing → created (username from pickAvailableUsername)
 *   membership         missing → created ACTIVE with `role`
 *                      ACTIVE  → reused as is (role is NOT changed)
 *                      SUSPENDED → 403, nothing reused
 *
 * RULES:
 * - Runs inside the caller's transaction; repos must already be trx-bound.
 * - No audits and no password here: the `*Created` flags tell the caller what
 *   to audit (provision-user-to-tenant.audit.ts), passwords go through setPassword.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { getUserByEmail, pickAvailableUsername, type User, type UserRepo } from '../../users';
import {
  assertMembershipNotSuspended,
  getMembershipByTenantAndUser,
  type Membership,
  type MembershipRepo,
  type MembershipRole,
} from '../../memberships';

export type ProvisionUserToTenantParams = {
  trx: DbExecutor;
  userRepo: UserRepo;
  membershipRepo: MembershipRepo;
  /** Lowercased by the caller's schema. */
  email: string;
  /** Used only when the user is new. */
  firstName: string;
  lastName: string;
  tenantId: string;
  /** Used only when the membership is new. */
  role: MembershipRole;
};

export type ProvisionResult = {
  user: User;
  membership: Membership;
  userCreated: boolean;
  membershipCreated: boolean;
};

async function ensureUser(
  p: ProvisionUserToTenantParams,
): Promise<{ user: User; created: boolean }> {
  const existing = await getUserByEmail(p.trx, p.email);
  if (existing) return { user: existing, created: false };

  const user = await p.userRepo.insertUser({
    email: p.email,
    username: await pickAvailableUsername(p.trx, p.email),
    firstName: p.firstName,
    lastName: p.lastName,
  });
  return { user, created: true };
}

async function ensureMembership(
  p: ProvisionUserToTenantParams,
  userId: string,
): Promise<{ membership: Membership; created: boolean }> {
  const existing = await getMembershipByTenantAndUser(p.trx, { tenantId: p.tenantId, userId });
  if (existing) {
    assertMembershipNotSuspended(existing);
    return { membership: existing, created: false };
  }

  const membership = await p.membershipRepo.insertMembership({
    tenantId: p.tenantId,
    userId,
    role: p.role,
  });
  return { membership, created: true };
}

export async function provisionUserToTenant(
  params: ProvisionUserToTenantParams,
): Promise<ProvisionResult> {
  const { user, created: userCreated } = await ensureUser(params);
  const { membership, created: membershipCreated } = await ensureMembership(params, user.id);

  return { user, membership, userCreated, membershipCreated };
}
