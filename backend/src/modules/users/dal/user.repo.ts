/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users. Writes are global, never tenant-scoped.
 *
 * RULES:
 * - The caller owns the transaction; bind with withDb(trx).
 * - Emails are lowercased on the way in; uniqueness of email and username is
 *   the database's job (callers check first and map conflicts to 409).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { User } from '../user.types';
import { toUser } from '../queries/user.queries';

export type NewUser = Pick<User, 'email' | 'username' | 'firstName' | 'lastName'>;
export type UserPatch = Partial<NewUser>;

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  async insertUser(user: NewUser): Promise<User> {
    const row = await this.db
      .insertInto('users')
      .values({
        email: user.email.toLowerCase(),
        username: user.username,
        first_name: user.firstName,
        last_name: user.lastName,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toUser(row);
  }

  /** Only the provided fields change; updated_at always moves. */
  async updateUser(userId: string, patch: UserPatch): Promise<void> {
    const { email, username, firstName, lastName } = patch;

    await this.db
      .updateTable('users')
      .set({
        email: email?.toLowerCase(),
        username,
        first_name: firstName,
        last_name: lastName,
        updated_at: new Date(),
      })
      .where('id', '=', userId)
      .execute();
  }
}
