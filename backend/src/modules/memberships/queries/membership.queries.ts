/**
 * backend/src/modules/memberships/queries/membership.queries.ts
 *
 * Row → Membership. role/status are text columns guarded by CHECK constraints;
 * an unexpected value maps to the least privileged reading (CLIENT, SUSPENDED).
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectMembershipSql,
  selectMembershipsOfUserSql,
  type MembershipKey,
  type MembershipRow,
} from '../dal/membership.query-sql';
import type { Membership, MembershipRole, MembershipStatus } from '../membership.types';

const ROLES: readonly MembershipRole[] = ['PROVIDER', 'CLIENT'];
const STATUSES: readonly MembershipStatus[] = ['ACTIVE', 'SUSPENDED'];

const oneOf = <T extends string>(allowed: readonly T[], value: string, fallback: T): T =>
  allowed.find((candidate) => candidate === value) ?? fallback;

export function toMembership(row: MembershipRow): Membership {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    userId: row.user_id,
    role: oneOf(ROLES, row.role, 'CLIENT'),
    status: oneOf(STATUSES, row.status, 'SUSPENDED'),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getMembershipByTenantAndUser(
  db: DbExecutor,
  key: MembershipKey,
): Promise<Membership | undefined> {
  const row = await selectMembershipSql(db, key);
  return row ? toMembership(row) : undefined;
}

/** Every provider the user belongs to, oldest first. */
export async function listMembershipsOfUser(
  db: DbExecutor,
  userId: string,
): Promise<Membership[]> {
  return (await selectMembershipsOfUserSql(db, userId)).map(toMembership);
}
