/**
 * src/modules/auth/helpers/set-password.ts
 *
 * WHY:
 * - Account-user creation, the profile form and the login cost upgrade all
 *   store a new password.
 *   Hashing and identity upsert must behave the same everywhere.
 *
 * RULES:
 * - Receives a trx-bound authRepo (caller owns the transaction).
 * - Never logs or returns the raw password or hash.
 */

import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { AuthRepo } from '../dal/auth.repo';

export async function setPassword(params: {
  authRepo: AuthRepo;
  passwordHasher: PasswordHasher;
  userId: string;
  rawPassword: string;
}): Promise<void> {
  const passwordHash = await params.passwordHasher.hash(params.rawPassword);
  await params.authRepo.upsertPasswordHash({ userId: params.userId, passwordHash });
}
