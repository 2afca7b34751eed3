/**
 * src/modules/auth/dal/auth.query-sql.ts
 *
 * DAL READS ONLY for auth_identities. Identities belong to the user, not the
 * tenant: one password works on every provider the user is a member of.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { AuthProvider } from '../auth.types';

export function selectPasswordHashSql(
  db: DbExecutor,
  userId: string,
  provider: AuthProvider = 'password',
): Promise<{ password_hash: string } | undefined> {
  return db
    .selectFrom('auth_identities')
    .select('password_hash')
    .where('user_id', '=', userId)
    .where('provider', '=', provider)
    .executeTakeFirst();
}
