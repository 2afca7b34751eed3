/**
 * backend/src/modules/account-users/dal/account-user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for account_users (mutations).
 * - Unique constraint (account_id, user_id) enforced by DB.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class AccountUserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): AccountUserRepo {
    return new AccountUserRepo(db);
  }

  async insertAccountUser(params: {
    accountId: string;
    userId: string;
    isAdmin: boolean;
  }): Promise<{ id: string }> {
    const row = await this.db
      .insertInto('account_users')
      .values({
        account_id: params.accountId,
        user_id: params.userId,
        is_admin: params.isAdmin,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();

    return { id: row.id };
  }

  async updateIsAdmin(params: {
    accountUserId: string;
    isAdmin: boolean;
    now: Date;
  }): Promise<void> {
    await this.db
      .updateTable('account_users')
      .set({ is_admin: params.isAdmin, updated_at: params.now })
      .where('id', '=', params.accountUserId)
      .execute();
  }

  /**
   * Removes the link only; the platform user and its membership stay.
   */
  async deleteAccountUser(accountUserId: string): Promise<void> {
    await this.db.deleteFrom('account_users').where('id', '=', accountUserId).execute();
  }
}
