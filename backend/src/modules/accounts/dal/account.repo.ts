/**
 * backend/src/modules/accounts/dal/account.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for accounts (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - Every write stamps updated_by_user_id and updated_at.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class AccountRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): AccountRepo {
    return new AccountRepo(db);
  }

  async insertAccount(params: {
    tenantId: string;
    name: string;
    isActive: boolean;
    actorUserId: string;
  }): Promise<{ id: string }> {
    const row = await this.db
      .insertInto('accounts')
      .values({
        tenant_id: params.tenantId,
        name: params.name,
        is_active: params.isActive,
        created_by_user_id: params.actorUserId,
        updated_by_user_id: params.actorUserId,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();

    return { id: row.id };
  }

  async updateAccount(params: {
    accountId: string;
    name: string;
    isActive: boolean;
    actorUserId: string;
    now: Date;
  }): Promise<void> {
    await this.db
      .updateTable('accounts')
      .set({
        name: params.name,
        is_active: params.isActive,
        updated_by_user_id: params.actorUserId,
        updated_at: params.now,
      })
      .where('id', '=', params.accountId)
      .execute();
  }

  /**
   * Marks the account as changed by the actor without touching its fields.
   * Called when one of its account users is created, edited or removed.
   */
  async touchAccount(params: { accountId: string; actorUserId: string; now: Date }): Promise<void> {
    await this.db
      .updateTable('accounts')
      .set({
        updated_by_user_id: params.actorUserId,
        updated_at: params.now,
      })
      .where('id', '=', params.accountId)
      .execute();
  }

  /**
   * Deletes the account; account_users rows go with it (FK cascade).
   */
  async deleteAccount(accountId: string): Promise<void> {
    await this.db.deleteFrom('accounts').where('id', '=', accountId).execute();
  }
}
