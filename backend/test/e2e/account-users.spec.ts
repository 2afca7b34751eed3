import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import type { TestConfigOverrides } from '../helpers/build-test-app';
import {
  addAccountUser,
  createAccount,
  createMember,
  createTenant,
  hostFor,
  loginCookie,
  readJson,
} from '../helpers/seed';
import type { ErrorResponseBody, RedirectResponseBody } from '../helpers/seed';
import type { AppDeps } from '../../src/app/di';

/**
 * E2E tests for the /accounts/:accountId/people pages.
 *
 * World per test:
 * - tenant "acme" with a PROVIDER (p@example.com)
 * - account "Initech": admin@example.com (account admin), plain@example.com (plain user)
 * - account "Hooli": no users
 */

type AccountUserBody = {
  id: string;
  accountId: string;
  userId: string;
  isAdmin: boolean;
  user: { email: string; firstName: string; lastName: string };
  url: string;
};

async function seedWorld(deps: AppDeps) {
  const tenant = await createTenant(deps.db, { key: 'acme' });
  const provider = await createMember(deps.db, deps.passwordHasher, {
    tenantId: tenant.id,
    email: 'p@example.com',
    role: 'PROVIDER',
  });
  const admin = await createMember(deps.db, deps.passwordHasher, {
    tenantId: tenant.id,
    email: 'admin@example.com',
    role: 'CLIENT',
  });
  const plain = await createMember(deps.db, deps.passwordHasher, {
    tenantId: tenant.id,
    email: 'plain@example.com',
    role: 'CLIENT',
  });

  const initech = await createAccount(deps.db, { tenantId: tenant.id, name: 'Initech' });
  const hooli = await createAccount(deps.db, { tenantId: tenant.id, name: 'Hooli' });
  const adminLink = await addAccountUser(deps.db, {
    accountId: initech.id,
    userId: admin.userId,
    isAdmin: true,
  });
  const plainLink = await addAccountUser(deps.db, {
    accountId: initech.id,
    userId: plain.userId,
  });

  return { tenant, provider, admin, plain, initech, hooli, adminLink, plainLink };
}

async function setup(overrides: TestConfigOverrides = {}) {
  const built = await buildTestApp(overrides);
  const world = await seedWorld(built.deps);
  return { ...built, world };
}

describe('GET /accounts/:accountId/people', () => {
  it('lists the account users with their user details', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.initech.id}/people`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(200);
      const body = readJson<{ account: { id: string }; accountUsers: AccountUserBody[] }>(res);
      expect(body.account.id).toBe(world.initech.id);
      expect(body.accountUsers.map((au) => [au.user.email, au.isAdmin]).sort()).toEqual([
        ['admin@example.com', true],
        ['plain@example.com', false],
      ]);

      const plainView = body.accountUsers.find((au) => au.id === world.plainLink.id);
      expect(plainView?.url).toBe(`/accounts/${world.initech.id}/people/${world.plainLink.id}`);
    } finally {
      await close();
    }
  });

  it('answers an empty list with 200 when empty lists are allowed', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.hooli.id}/people`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(200);
      expect(readJson<{ accountUsers: AccountUserBody[] }>(res).accountUsers).toEqual([]);
    } finally {
      await close();
    }
  });

  it('answers an empty list with 404 when empty lists are not allowed', async () => {
    const { app, world, close } = await setup({ accountUsers: { allowEmpty: false } });

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.hooli.id}/people`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(res).error).toEqual({
        code: 'NOT_FOUND',
        message: "Empty list and 'allowEmpty' is false.",
      });

      const filled = await app.inject({
        method: 'GET',
        url: `/accounts/${world.initech.id}/people`,
        headers: { host: hostFor('acme'), cookie },
      });
      expect(filled.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('answers 404 for an account the CLIENT does not belong to', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'admin@example.com',
      });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.hooli.id}/people`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe('Account not found');
    } finally {
      await close();
    }
  });
});

describe('GET /accounts/:accountId/people/:accountUserId', () => {
  it('shows one account user to any member of the account', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'plain@example.com',
      });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.initech.id}/people/${world.adminLink.id}`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(200);
      const body = readJson<{ accountUser: AccountUserBody }>(res);
      expect(body.accountUser.userId).toBe(world.admin.userId);
      expect(body.accountUser.isAdmin).toBe(true);
    } finally {
      await close();
    }
  });

  it('answers 404 when the account user belongs to another account', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.hooli.id}/people/${world.plainLink.id}`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe('Account user not found');

      const malformed = await app.inject({
        method: 'GET',
        url: `/accounts/${world.initech.id}/people/nope`,
        headers: { host: hostFor('acme'), cookie },
      });
      expect(malformed.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(malformed).error.message).toBe(
        'Account user not found',
      );
    } finally {
      await close();
    }
  });
});

describe('/accounts/:accountId/people/add', () => {
  it('refuses a plain account user with 403', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'plain@example.com',
      });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.initech.id}/people/add`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(403);
      expect(readJson<ErrorResponseBody>(res).error).toEqual({
        code: 'FORBIDDEN',
        message: 'You cannot manage users of this account.',
      });
    } finally {
      await close();
    }
  });

  it('serves the add form to an account admin', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'admin@example.com',
      });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.initech.id}/people/add`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(200);
      const body = readJson<{ account: { id: string }; form: { initial: unknown } }>(res);
      expect(body.account.id).toBe(world.initech.id);
      expect(body.form.initial).toEqual({
        email: '',
        firstName: '',
        lastName: '',
        isAdmin: false,
      });
    } finally {
      await close();
    }
  });

  it('creates a new user, links it to the account and redirects to its page', async () => {
    const { app, deps, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/add`,
        headers: { host: hostFor('acme'), cookie },
        payload: {
          email: 'New@Example.com',
          firstName: 'Nina',
          lastName: 'New',
          password1: 'long-password',
          password2: 'long-password',
        },
      });

      const link = await deps.db
        .selectFrom('account_users')
        .innerJoin('users', 'users.id', 'account_users.user_id')
        .select([
          'account_users.id',
          'account_users.account_id',
          'account_users.is_admin',
          'users.id as userId',
          'users.email',
          'users.first_name',
        ])
        .where('users.email', '=', 'new@example.com')
        .executeTakeFirstOrThrow();

      const target = `/accounts/${world.initech.id}/people/${link.id}`;
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe(target);
      expect(readJson<RedirectResponseBody>(res)).toEqual({ redirectTo: target });

      expect(link.account_id).toBe(world.initech.id);
      expect(link.is_admin).toBe(false);
      expect(link.first_name).toBe('Nina');

      const membership = await deps.db
        .selectFrom('memberships')
        .select(['role'])
        .where('tenant_id', '=', world.tenant.id)
        .where('user_id', '=', link.userId)
        .executeTakeFirstOrThrow();
      expect(membership.role).toBe('CLIENT');

      const account = await deps.db
        .selectFrom('accounts')
        .select(['updated_by_user_id'])
        .where('id', '=', world.initech.id)
        .executeTakeFirstOrThrow();
      expect(account.updated_by_user_id).toBe(world.provider.userId);

      const audit = await deps.db
        .selectFrom('audit_events')
        .select(['metadata'])
        .where('action', '=', 'account_user.created')
        .executeTakeFirstOrThrow();
      expect(audit.metadata).toEqual({
        accountId: world.initech.id,
        accountUserId: link.id,
        userId: link.userId,
        email: 'new@example.com',
        isAdmin: false,
        passwordSet: true,
      });

      // the new user can sign in with the password set on creation
      await expect(
        loginCookie(app, {
          host: hostFor('acme'),
          email: 'new@example.com',
          password: 'long-password',
        }),
      ).resolves.toMatch(/^sid=/);
    } finally {
      await close();
    }
  });

  it('links an existing user of another account', async () => {
    const { app, deps, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.hooli.id}/people/add`,
        headers: { host: hostFor('acme'), cookie },
        payload: { email: 'plain@example.com', isAdmin: true },
      });

      expect(res.statusCode).toBe(302);

      const links = await deps.db
        .selectFrom('account_users')
        .select(['account_id', 'is_admin'])
        .where('user_id', '=', world.plain.userId)
        .orderBy('is_admin', 'asc')
        .execute();
      expect(links).toEqual([
        { account_id: world.initech.id, is_admin: false },
        { account_id: world.hooli.id, is_admin: true },
      ]);
    } finally {
      await close();
    }
  });

  it('refuses to link a user twice with 409', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/add`,
        headers: { host: hostFor('acme'), cookie },
        payload: { email: 'plain@example.com' },
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res).error).toEqual({
        code: 'CONFLICT',
        message: 'User is already a member of this account.',
      });
    } finally {
      await close();
    }
  });

  it('refuses a password for an existing user with 400', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.hooli.id}/people/add`,
        headers: { host: hostFor('acme'), cookie },
        payload: {
          email: 'plain@example.com',
          password1: 'long-password',
          password2: 'long-password',
        },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'A password can only be set for a new user.',
      );

      // the existing password still works
      await expect(
        loginCookie(app, { host: hostFor('acme'), email: 'plain@example.com' }),
      ).resolves.toMatch(/^sid=/);
    } finally {
      await close();
    }
  });

  it('rejects mismatched passwords with 400', async () => {
    const { app, deps, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/add`,
        headers: { host: hostFor('acme'), cookie },
        payload: {
          email: 'new@example.com',
          password1: 'long-password',
          password2: 'other-password',
        },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Passwords do not match.',
      });

      const user = await deps.db
        .selectFrom('users')
        .select(['id'])
        .where('email', '=', 'new@example.com')
        .executeTakeFirst();
      expect(user).toBeUndefined();
    } finally {
      await close();
    }
  });
});

describe('/accounts/:accountId/people/:accountUserId/edit', () => {
  it('prefills the edit form', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'admin@example.com',
      });

      const res = await app.inject({
        method: 'GET',
        url: `/accounts/${world.initech.id}/people/${world.plainLink.id}/edit`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(200);
      expect(readJson<{ form: { initial: unknown } }>(res).form.initial).toEqual({
        email: 'plain@example.com',
        firstName: '',
        lastName: '',
        isAdmin: false,
      });
    } finally {
      await close();
    }
  });

  it('updates the user and the admin flag', async () => {
    const { app, deps, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'admin@example.com',
      });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/${world.plainLink.id}/edit`,
        headers: { host: hostFor('acme'), cookie },
        payload: {
          email: 'Plain.Renamed@Example.com',
          firstName: 'Pat',
          lastName: 'Plain',
          isAdmin: true,
        },
      });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe(
        `/accounts/${world.initech.id}/people/${world.plainLink.id}`,
      );

      const user = await deps.db
        .selectFrom('users')
        .select(['email', 'first_name', 'last_name'])
        .where('id', '=', world.plain.userId)
        .executeTakeFirstOrThrow();
      expect(user).toEqual({
        email: 'plain.renamed@example.com',
        first_name: 'Pat',
        last_name: 'Plain',
      });

      const link = await deps.db
        .selectFrom('account_users')
        .select(['is_admin'])
        .where('id', '=', world.plainLink.id)
        .executeTakeFirstOrThrow();
      expect(link.is_admin).toBe(true);

      const account = await deps.db
        .selectFrom('accounts')
        .select(['updated_by_user_id'])
        .where('id', '=', world.initech.id)
        .executeTakeFirstOrThrow();
      expect(account.updated_by_user_id).toBe(world.admin.userId);
    } finally {
      await close();
    }
  });

  it("refuses another user's email with 409", async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/${world.plainLink.id}/edit`,
        headers: { host: hostFor('acme'), cookie },
        payload: { email: 'admin@example.com', isAdmin: false },
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe('Email is already in use.');
    } finally {
      await close();
    }
  });
});

describe('editing users shared with other providers', () => {
  it("keeps another provider's user intact but lets the admin flag change", async () => {
    const { app, deps, world, close } = await setup();

    try {
      const globex = await createTenant(deps.db, { key: 'globex' });
      await createMember(deps.db, deps.passwordHasher, {
        tenantId: globex.id,
        email: 'boss@globex.example',
        role: 'PROVIDER',
      });
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'admin@example.com',
      });

      const added = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/add`,
        headers: { host: hostFor('acme'), cookie },
        payload: { email: 'boss@globex.example' },
      });
      expect(added.statusCode).toBe(302);
      const editUrl = `${String(added.headers.location)}/edit`;

      const renamed = await app.inject({
        method: 'POST',
        url: editUrl,
        headers: { host: hostFor('acme'), cookie },
        payload: { email: 'taken-over@example.com', isAdmin: false },
      });
      expect(renamed.statusCode).toBe(403);
      expect(readJson<ErrorResponseBody>(renamed).error).toEqual({
        code: 'FORBIDDEN',
        message: "You cannot change this user's email or name.",
      });

      await expect(
        loginCookie(app, { host: hostFor('globex'), email: 'boss@globex.example' }),
      ).resolves.toMatch(/^sid=/);

      const promoted = await app.inject({
        method: 'POST',
        url: editUrl,
        headers: { host: hostFor('acme'), cookie },
        payload: { email: 'boss@globex.example', isAdmin: true },
      });
      expect(promoted.statusCode).toBe(302);

      const link = await deps.db
        .selectFrom('account_users')
        .innerJoin('users', 'users.id', 'account_users.user_id')
        .select(['users.email', 'account_users.is_admin'])
        .where('account_users.account_id', '=', world.initech.id)
        .where('users.email', '=', 'boss@globex.example')
        .executeTakeFirstOrThrow();
      expect(link).toEqual({ email: 'boss@globex.example', is_admin: true });
    } finally {
      await close();
    }
  });

  it("refuses a CLIENT admin changing a PROVIDER's name", async () => {
    const { app, deps, world, close } = await setup();

    try {
      const providerLink = await addAccountUser(deps.db, {
        accountId: world.initech.id,
        userId: world.provider.userId,
      });
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'admin@example.com',
      });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/${providerLink.id}/edit`,
        headers: { host: hostFor('acme'), cookie },
        payload: { email: 'p@example.com', firstName: 'Mallory', isAdmin: false },
      });

      expect(res.statusCode).toBe(403);
      const user = await deps.db
        .selectFrom('users')
        .select(['first_name'])
        .where('id', '=', world.provider.userId)
        .executeTakeFirstOrThrow();
      expect(user.first_name).toBe('');
    } finally {
      await close();
    }
  });
});

describe('/accounts/:accountId/people/:accountUserId/delete', () => {
  it('removes the link, keeps the user and redirects to the list', async () => {
    const { app, deps, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, { host: hostFor('acme'), email: 'p@example.com' });

      const confirm = await app.inject({
        method: 'GET',
        url: `/accounts/${world.initech.id}/people/${world.plainLink.id}/delete`,
        headers: { host: hostFor('acme'), cookie },
      });
      expect(confirm.statusCode).toBe(200);
      expect(readJson<{ accountUser: AccountUserBody }>(confirm).accountUser.id).toBe(
        world.plainLink.id,
      );

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/${world.plainLink.id}/delete`,
        headers: { host: hostFor('acme'), cookie },
      });

      const target = `/accounts/${world.initech.id}/people`;
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe(target);
      expect(readJson<RedirectResponseBody>(res)).toEqual({ redirectTo: target });

      const link = await deps.db
        .selectFrom('account_users')
        .select(['id'])
        .where('id', '=', world.plainLink.id)
        .executeTakeFirst();
      expect(link).toBeUndefined();

      const user = await deps.db
        .selectFrom('users')
        .select(['email'])
        .where('id', '=', world.plain.userId)
        .executeTakeFirstOrThrow();
      expect(user.email).toBe('plain@example.com');
    } finally {
      await close();
    }
  });

  it('refuses a plain account user with 403', async () => {
    const { app, world, close } = await setup();

    try {
      const cookie = await loginCookie(app, {
        host: hostFor('acme'),
        email: 'plain@example.com',
      });

      const res = await app.inject({
        method: 'POST',
        url: `/accounts/${world.initech.id}/people/${world.adminLink.id}/delete`,
        headers: { host: hostFor('acme'), cookie },
      });

      expect(res.statusCode).toBe(403);
    } finally {
      await close();
    }
  });
});
