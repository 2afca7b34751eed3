/**
 * backend/src/modules/account-users/policies/account-user-access.policy.ts
 *
 * WHY:
 * - Who may manage the users of an account, and what "not found" means.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - PROVIDER actors manage the users of every account they can see.
 * - CLIENT actors manage them only when they are an admin of that account.
 * - Users are global. Their email and names may only be changed from a
 *   provider they belong to exclusively, and a CLIENT never changes a
 *   PROVIDER's. The admin flag of the link stays editable either way.
 */

import type { Membership, MembershipRole } from '../../memberships/membership.types';
import type { AccountUser } from '../account-user.types';
import { AccountErrors } from '../../accounts';
import { AccountUserErrors } from '../account-user.errors';

export function canManageAccountUsers(
  actor: Readonly<{ role: MembershipRole }>,
  actorAccountUser: Pick<AccountUser, 'isAdmin'> | undefined,
): boolean {
  if (actor.role === 'PROVIDER') return true;
  return actorAccountUser?.isAdmin === true;
}

export function assertCanManageAccountUsers(
  actor: Readonly<{ role: MembershipRole; userId: string }>,
  actorAccountUser: Pick<AccountUser, 'isAdmin'> | undefined,
  accountId: string,
): void {
  if (!canManageAccountUsers(actor, actorAccountUser)) {
    throw AccountErrors.cannotManageUsers({ accountId, userId: actor.userId });
  }
}

export function canEditUserIdentity(
  actor: Readonly<{ role: MembershipRole; tenantId: string }>,
  targetMemberships: readonly Pick<Membership, 'tenantId' | 'role'>[],
): boolean {
  return targetMemberships.every(
    (m) => m.tenantId === actor.tenantId && (actor.role === 'PROVIDER' || m.role !== 'PROVIDER'),
  );
}

export function assertCanEditUserIdentity(
  actor: Readonly<{ role: MembershipRole; tenantId: string; userId: string }>,
  targetMemberships: readonly Pick<Membership, 'tenantId' | 'role'>[],
  meta: { accountUserId: string },
): void {
  if (!canEditUserIdentity(actor, targetMemberships)) {
    throw AccountUserErrors.identityLocked({ ...meta, actorUserId: actor.userId });
  }
}

export function assertAccountUserExists(
  accountUser: AccountUser | undefined,
  meta: { accountId: string; accountUserId: string },
): asserts accountUser is AccountUser {
  if (!accountUser) {
    throw AccountUserErrors.accountUserNotFound(meta);
  }
}

/**
 * An empty list is a 404 unless empty lists are allowed.
 */
export function assertListAllowed(items: readonly unknown[], allowEmpty: boolean): void {
  if (items.length === 0 && !allowEmpty) {
    throw AccountUserErrors.emptyList();
  }
}
