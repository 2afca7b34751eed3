/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * DAL READS ONLY. Users are global identities, so nothing here is tenant-scoped.
 * Emails are stored lowercase; lookups by email lowercase the input too.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Users } from '../../../shared/db/schema';

export type UserRow = Selectable<Users>;

/** Columns with a unique index; each identifies at most one user. */
export type UserLookupColumn = 'id' | 'email' | 'username';

export function selectUserSql(
  db: DbExecutor,
  column: UserLookupColumn,
  value: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where(column, '=', column === 'email' ? value.toLowerCase() : value)
    .executeTakeFirst();
}
