/**
 * backend/src/modules/memberships/dal/membership.query-sql.ts
 *
 * DAL READS ONLY. (tenant_id, user_id) is unique: a user has at most one
 * membership per provider.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Memberships } from '../../../shared/db/schema';

export type MembershipRow = Selectable<Memberships>;

export type MembershipKey = { tenantId: string; userId: string };

export function selectMembershipSql(
  db: DbExecutor,
  key: MembershipKey,
): Promise<MembershipRow | undefined> {
  return db
    .selectFrom('memberships')
    .selectAll()
    .where((eb) => eb.and({ tenant_id: key.tenantId, user_id: key.userId }))
    .executeTakeFirst();
}

export function selectMembershipsOfUserSql(
  db: DbExecutor,
  userId: string,
): Promise<MembershipRow[]> {
  return db
    .selectFrom('memberships')
    .selectAll()
    .where('user_id', '=', userId)
    .orderBy('created_at', 'asc')
    .execute();
}
