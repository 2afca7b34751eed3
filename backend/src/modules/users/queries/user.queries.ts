/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * Read side of users: row → User mapping plus username allocation for new users.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectUserSql, type UserLookupColumn, type UserRow } from '../dal/user.query-sql';
import type { User } from '../user.types';
import { USERNAME_DISALLOWED_CHARS, USERNAME_MAX_LENGTH } from '../user.constants';

const SUFFIX_LENGTH = 6;

export const toUser = (row: UserRow): User => ({
  id: row.id,
  email: row.email,
  username: row.username,
  firstName: row.first_name,
  lastName: row.last_name,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

async function findUser(
  db: DbExecutor,
  column: UserLookupColumn,
  value: string,
): Promise<User | undefined> {
  const row = await selectUserSql(db, column, value);
  return row && toUser(row);
}

export const getUserById = (db: DbExecutor, userId: string) => findUser(db, 'id', userId);

export const getUserByEmail = (db: DbExecutor, email: string) => findUser(db, 'email', email);

export const getUserByUsername = (db: DbExecutor, username: string) =>
  findUser(db, 'username', username);

const randomSuffix = () =>
  Math.random()
    .toString(36)
    .slice(2, 2 + SUFFIX_LENGTH);

/**
 * New users get their lowercased email as username, minus characters the
 * profile form would reject, cut to the maximum length. When that name is
 * taken, a random suffix is tried until one is free; the base is shortened
 * so the suffixed name still fits.
 */
export async function pickAvailableUsername(db: DbExecutor, email: string): Promise<string> {
  const cleaned = email.toLowerCase().replace(USERNAME_DISALLOWED_CHARS, '') || 'user';
  const suffixedBase = cleaned.slice(0, USERNAME_MAX_LENGTH - SUFFIX_LENGTH - 1);
  let candidate = cleaned.slice(0, USERNAME_MAX_LENGTH);

  while (await selectUserSql(db, 'username', candidate)) {
    candidate = `${suffixedBase}-${randomSuffix()}`;
  }
  return candidate;
}
