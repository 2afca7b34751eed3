import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { getPasswordHash } from '../../src/modules/auth/queries/auth.queries';
import { setPassword } from '../../src/modules/auth/helpers/set-password';

describe('auth identities DAL', () => {
  it('setPassword creates the identity, then replaces its hash in place', async () => {
    const { deps, close } = await buildTestApp();
    const { db, passwordHasher } = deps;

    try {
      const user = await new UserRepo(db).insertUser({
        email: 'pw@example.com',
        username: 'pw@example.com',
        firstName: '',
        lastName: '',
      });
      const store = (rawPassword: string) =>
        setPassword({ authRepo: deps.repos.authRepo, passwordHasher, userId: user.id, rawPassword });

      await store('first-password');
      const first = await getPasswordHash(db, user.id);
      expect(await passwordHasher.verify('first-password', first ?? '')).toBe(true);

      await store('second-password');
      const second = await getPasswordHash(db, user.id);
      expect(await passwordHasher.verify('second-password', second ?? '')).toBe(true);
      expect(await passwordHasher.verify('first-password', second ?? '')).toBe(false);

      const rows = await db
        .selectFrom('auth_identities')
        .select('provider')
        .where('user_id', '=', user.id)
        .execute();
      expect(rows).toEqual([{ provider: 'password' }]);
    } finally {
      await close();
    }
  });

  it('returns undefined for a user without password', async () => {
    const { deps, close } = await buildTestApp();
    try {
      const user = await new UserRepo(deps.db).insertUser({
        email: 'nopw@example.com',
        username: 'nopw@example.com',
        firstName: '',
        lastName: '',
      });

      expect(await getPasswordHash(deps.db, user.id)).toBeUndefined();
    } finally {
      await close();
    }
  });
});
