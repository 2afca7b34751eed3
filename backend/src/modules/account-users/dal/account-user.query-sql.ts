/**
 * backend/src/modules/account-users/dal/account-user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for account_users, joined with the user they point at.
 * - Always account-scoped: an id from another account never matches.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { DbExecutor } from '../../../shared/db/db';

function accountUsersWithUser(db: DbExecutor) {
  return db
    .selectFrom('account_users')
    .innerJoin('users', 'users.id', 'account_users.user_id')
    .select([
      'account_users.id',
      'account_users.account_id',
      'account_users.user_id',
      'account_users.is_admin',
      'account_users.created_at',
      'account_users.updated_at',
      'users.username',
      'users.email',
      'users.first_name',
      'users.last_name',
    ]);
}

export type AccountUserRow = Awaited<
  ReturnType<ReturnType<typeof accountUsersWithUser>['executeTakeFirstOrThrow']>
>;

export async function selectAccountUsersByAccountSql(
  db: DbExecutor,
  accountId: string,
): Promise<AccountUserRow[]> {
  return accountUsersWithUser(db)
    .where('account_users.account_id', '=', accountId)
    .orderBy('account_users.created_at', 'asc')
    .orderBy('account_users.id', 'asc')
    .execute();
}

export async function selectAccountUserByIdSql(
  db: DbExecutor,
  params: { accountId: string; accountUserId: string },
): Promise<AccountUserRow | undefined> {
  return accountUsersWithUser(db)
    .where('account_users.account_id', '=', params.accountId)
    .where('account_users.id', '=', params.accountUserId)
    .executeTakeFirst();
}

export async function selectAccountUserByUserSql(
  db: DbExecutor,
  params: { accountId: string; userId: string },
): Promise<AccountUserRow | undefined> {
  return accountUsersWithUser(db)
    .where('account_users.account_id', '=', params.accountId)
    .where('account_users.user_id', '=', params.userId)
    .executeTakeFirst();
}
