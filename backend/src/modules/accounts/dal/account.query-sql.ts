/**
 * backend/src/modules/accounts/dal/account.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for accounts (raw SQL access).
 * - Always tenant-scoped; client-scoped reads additionally require an
 *   account_users row for the reading user.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Accounts } from '../../../shared/db/schema';

export type AccountRow = Selectable<Accounts>;

export type AccountScope = {
  tenantId: string;
  /** When set, only accounts this user belongs to are returned. */
  memberUserId: string | null;
};

function scopedAccounts(db: DbExecutor, scope: AccountScope) {
  let query = db
    .selectFrom('accounts')
    .selectAll('accounts')
    .where('accounts.tenant_id', '=', scope.tenantId);

  const memberUserId = scope.memberUserId;
  if (memberUserId !== null) {
    query = query.where((eb) =>
      eb.exists(
        eb
          .selectFrom('account_users')
          .select('account_users.id')
          .whereRef('account_users.account_id', '=', 'accounts.id')
          .where('account_users.user_id', '=', memberUserId),
      ),
    );
  }

  return query;
}

export async function selectAccountsSql(
  db: DbExecutor,
  scope: AccountScope,
): Promise<AccountRow[]> {
  return scopedAccounts(db, scope)
    .orderBy('accounts.name', 'asc')
    .orderBy('accounts.id', 'asc')
    .execute();
}

export async function selectAccountByIdSql(
  db: DbExecutor,
  scope: AccountScope,
  accountId: string,
): Promise<AccountRow | undefined> {
  return scopedAccounts(db, scope).where('accounts.id', '=', accountId).executeTakeFirst();
}
