/**
 * src/modules/auth/dal/auth.repo.ts
 *
 * Writes to auth_identities. A user has at most one row per provider
 * (unique on user_id, provider); the password row is created on first use
 * and its hash replaced afterwards. Callers own the transaction.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { AuthProvider } from '../auth.types';

const PASSWORD: AuthProvider = 'password';

export class AuthRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): AuthRepo {
    return new AuthRepo(db);
  }

  async upsertPasswordHash({
    userId,
    passwordHash,
  }: {
    userId: string;
    passwordHash: string;
  }): Promise<void> {
    await this.db
      .insertInto('auth_identities')
      .values({ user_id: userId, provider: PASSWORD, password_hash: passwordHash })
      .onConflict((conflict) =>
        conflict
          .columns(['user_id', 'provider'])
          .doUpdateSet({ password_hash: passwordHash, updated_at: new Date() }),
      )
      .execute();
  }
}
