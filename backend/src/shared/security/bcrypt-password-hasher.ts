/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - bcrypt implementation of PasswordHasher.
 * - The cost comes from config (BCRYPT_COST); tests pass a low cost.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const DEFAULT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts: { cost?: number } = {}) {
    this.cost = opts.cost ?? DEFAULT_COST;
  }

  hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }

  needsRehash(hash: string): boolean {
    try {
      return bcrypt.getRounds(hash) !== this.cost;
    } catch {
      // not a bcrypt hash at all
      return true;
    }
  }
}
