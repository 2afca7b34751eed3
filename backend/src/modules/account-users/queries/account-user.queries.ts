/**
 * backend/src/modules/account-users/queries/account-user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape joined rows into AccountUser domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectAccountUserByIdSql,
  selectAccountUserByUserSql,
  selectAccountUsersByAccountSql,
} from '../dal/account-user.query-sql';
import type { AccountUserRow } from '../dal/account-user.query-sql';
import type { AccountUser, AccountUserView } from '../account-user.types';
import { accountUserUrl } from '../../accounts';

function toAccountUser(row: AccountUserRow): AccountUser {
  return {
    id: row.id,
    accountId: row.account_id,
    userId: row.user_id,
    isAdmin: row.is_admin,
    user: {
      id: row.user_id,
      username: row.username,
      email: row.email,
      firstName: row.first_name,
      lastName: row.last_name,
    },
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toAccountUserView(accountUser: AccountUser): AccountUserView {
  return { ...accountUser, url: accountUserUrl(accountUser.accountId, accountUser.id) };
}

export async function listAccountUsers(
  db: DbExecutor,
  accountId: string,
): Promise<AccountUser[]> {
  const rows = await selectAccountUsersByAccountSql(db, accountId);
  return rows.map(toAccountUser);
}

export async function getAccountUser(
  db: DbExecutor,
  params: { accountId: string; accountUserId: string },
): Promise<AccountUser | undefined> {
  const row = await selectAccountUserByIdSql(db, params);
  if (!row) return undefined;
  return toAccountUser(row);
}

export async function getAccountUserForUser(
  db: DbExecutor,
  params: { accountId: string; userId: string },
): Promise<AccountUser | undefined> {
  const row = await selectAccountUserByUserSql(db, params);
  if (!row) return undefined;
  return toAccountUser(row);
}
