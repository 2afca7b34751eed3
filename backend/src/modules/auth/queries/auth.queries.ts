/**
 * src/modules/auth/queries/auth.queries.ts
 *
 * The stored hash is only ever handed to PasswordHasher.verify/needsRehash;
 * it never leaves the auth module in a response or a log line.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectPasswordHashSql } from '../dal/auth.query-sql';

/** undefined when the user has no password identity (cannot sign in with a password). */
export async function getPasswordHash(db: DbExecutor, userId: string): Promise<string | undefined> {
  const row = await selectPasswordHashSql(db, userId);
  return row?.password_hash;
}
