/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Login, account-user creation and profile edits all hash or check
 *   passwords; they depend on this interface, never on bcrypt directly.
 *
 * RULES:
 * - hash() output is self-describing (algorithm + cost live in the hash).
 * - needsRehash() is true when a stored hash was made with other settings;
 *   login upgrades such hashes after a successful verify.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
  needsRehash(hash: string): boolean;
}
