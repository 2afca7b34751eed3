/**
 * backend/src/modules/accounts/queries/account.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Account domain types.
 * - Visibility: PROVIDER actors see every account of their tenant,
 *   CLIENT actors only the accounts they belong to.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectAccountByIdSql, selectAccountsSql } from '../dal/account.query-sql';
import type { AccountRow, AccountScope } from '../dal/account.query-sql';
import type { Account, AccountActor, AccountView } from '../account.types';
import { accountUrl } from '../account.urls';

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    isActive: row.is_active,
    createdByUserId: row.created_by_user_id,
    updatedByUserId: row.updated_by_user_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toAccountView(account: Account): AccountView {
  return { ...account, url: accountUrl(account.id) };
}

function scopeFor(actor: AccountActor): AccountScope {
  return {
    tenantId: actor.tenantId,
    memberUserId: actor.role === 'PROVIDER' ? null : actor.userId,
  };
}

export async function listVisibleAccounts(db: DbExecutor, actor: AccountActor): Promise<Account[]> {
  const rows = await selectAccountsSql(db, scopeFor(actor));
  return rows.map(toAccount);
}

export async function getVisibleAccount(
  db: DbExecutor,
  actor: AccountActor,
  accountId: string,
): Promise<Account | undefined> {
  const row = await selectAccountByIdSql(db, scopeFor(actor), accountId);
  if (!row) return undefined;
  return toAccount(row);
}
