import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import {
  TEST_PASSWORD,
  createMember,
  createTenant,
  hostFor,
  loginCookie,
  readJson,
} from '../helpers/seed';
import type { ErrorResponseBody } from '../helpers/seed';
import { BcryptPasswordHasher } from '../../src/shared/security/bcrypt-password-hasher';

// Login and logout against a fresh database per test. Members are inserted
// directly so each case only exercises the endpoint under test.

type LoginBody = {
  status: 'AUTHENTICATED';
  user: { id: string; email: string; username: string; firstName: string; lastName: string };
  membership: { id: string; role: 'PROVIDER' | 'CLIENT' };
};

let t: Awaited<ReturnType<typeof buildTestApp>>;
let acme: { id: string; key: string };

beforeEach(async () => {
  t = await buildTestApp();
  acme = await createTenant(t.deps.db, { key: 'acme' });
});

afterEach(async () => {
  await t.close();
});

const login = (payload: Record<string, unknown>, host = hostFor('acme')) =>
  t.app.inject({ method: 'POST', url: '/auth/login', headers: { host }, payload });

const member = (email: string, extra: Partial<Parameters<typeof createMember>[2]> = {}) =>
  createMember(t.deps.db, t.deps.passwordHasher, {
    tenantId: acme.id,
    email,
    role: 'CLIENT',
    ...extra,
  });

const auditRows = (tenantId: string) =>
  t.deps.db
    .selectFrom('audit_events')
    .select(['action', 'user_id', 'metadata'])
    .where('tenant_id', '=', tenantId)
    .orderBy('created_at', 'asc')
    .execute();

const errorOf = (res: { json: () => unknown }) => readJson<ErrorResponseBody>(res).error;

describe('POST /auth/login', () => {
  it('sets a session cookie and returns the user and membership', async () => {
    const client = await member('client@example.com');

    const res = await login({ email: 'Client@Example.com', password: TEST_PASSWORD });

    expect(res.statusCode).toBe(200);
    expect(readJson<LoginBody>(res)).toEqual({
      status: 'AUTHENTICATED',
      user: {
        id: client.userId,
        email: 'client@example.com',
        username: 'client@example.com',
        firstName: '',
        lastName: '',
      },
      membership: { id: client.membershipId, role: 'CLIENT' },
    });
    expect(String(res.headers['set-cookie'])).toMatch(
      /^sid=[^;]+; Path=\/; HttpOnly; SameSite=Strict$/,
    );

    const audits = await auditRows(acme.id);
    expect(audits.map((a) => [a.action, a.user_id])).toEqual([
      ['auth.login.success', client.userId],
    ]);
  });

  it('rejects a wrong password with 401 and records why', async () => {
    const client = await member('client@example.com');

    const res = await login({ email: 'client@example.com', password: 'wrong-password' });

    expect(res.statusCode).toBe(401);
    expect(errorOf(res)).toEqual({
      code: 'UNAUTHORIZED',
      message: 'Invalid email or password.',
    });
    expect(await auditRows(acme.id)).toEqual([
      {
        action: 'auth.login.failed',
        user_id: client.userId,
        metadata: { email: 'client@example.com', reason: 'wrong_password' },
      },
    ]);
  });

  it('answers an unknown email exactly like a wrong password', async () => {
    const res = await login({ email: 'nobody@example.com', password: TEST_PASSWORD });

    expect(res.statusCode).toBe(401);
    expect(errorOf(res).message).toBe('Invalid email or password.');

    const [audit] = await auditRows(acme.id);
    expect(audit?.metadata).toEqual({ email: 'nobody@example.com', reason: 'user_not_found' });
  });

  it('treats a user without a password like a wrong password', async () => {
    await member('nopass@example.com', { password: null });

    const res = await login({ email: 'nopass@example.com', password: TEST_PASSWORD });

    expect(res.statusCode).toBe(401);
    const [audit] = await auditRows(acme.id);
    expect(audit?.metadata).toEqual({
      email: 'nopass@example.com',
      reason: 'no_password_identity',
    });
  });

  it('refuses a suspended membership with 403', async () => {
    await member('gone@example.com', { status: 'SUSPENDED' });

    const res = await login({ email: 'gone@example.com', password: TEST_PASSWORD });

    expect(res.statusCode).toBe(403);
    expect(errorOf(res).message).toBe('Your account has been suspended.');
  });

  it('refuses a user who belongs to another provider with 403', async () => {
    const globex = await createTenant(t.deps.db, { key: 'globex' });
    await member('elsewhere@example.com', { tenantId: globex.id, role: 'PROVIDER' });

    const res = await login({ email: 'elsewhere@example.com', password: TEST_PASSWORD });

    expect(res.statusCode).toBe(403);
    expect(errorOf(res).message).toBe("You don't have access to this provider.");
  });

  it('answers 404 for an unknown provider and 400 on the bare host', async () => {
    const payload = { email: 'a@example.com', password: TEST_PASSWORD };

    const unknown = await login(payload, hostFor('missing'));
    expect(unknown.statusCode).toBe(404);
    expect(errorOf(unknown).message).toBe('Provider not found');

    const bare = await login(payload, 'localhost:3000');
    expect(bare.statusCode).toBe(400);
  });

  it('rejects an invalid body with 400 VALIDATION_ERROR', async () => {
    const res = await login({ email: 'not-an-email' });

    expect(res.statusCode).toBe(400);
    expect(errorOf(res).code).toBe('VALIDATION_ERROR');
  });

  it('re-hashes a password stored at an outdated cost', async () => {
    const { db, passwordHasher } = t.deps;
    const client = await createMember(db, new BcryptPasswordHasher({ cost: 5 }), {
      tenantId: acme.id,
      email: 'client@example.com',
      role: 'CLIENT',
    });

    const storedHash = async () =>
      (
        await db
          .selectFrom('auth_identities')
          .select('password_hash')
          .where('user_id', '=', client.userId)
          .executeTakeFirstOrThrow()
      ).password_hash;

    const before = await storedHash();
    expect(passwordHasher.needsRehash(before)).toBe(true);

    await loginCookie(t.app, { host: hostFor('acme'), email: 'client@example.com' });

    const after = await storedHash();
    expect(after).not.toBe(before);
    expect(passwordHasher.needsRehash(after)).toBe(false);
    await expect(passwordHasher.verify(TEST_PASSWORD, after)).resolves.toBe(true);
  });
});

describe('sessions', () => {
  const accounts = (host: string, cookie: string) =>
    t.app.inject({ method: 'GET', url: '/accounts', headers: { host, cookie } });

  it('ignores a session cookie presented on another provider host', async () => {
    await createTenant(t.deps.db, { key: 'globex' });
    await member('p@example.com', { role: 'PROVIDER' });

    const cookie = await loginCookie(t.app, { host: hostFor('acme'), email: 'p@example.com' });

    expect((await accounts(hostFor('acme'), cookie)).statusCode).toBe(200);

    const foreign = await accounts(hostFor('globex'), cookie);
    expect(foreign.statusCode).toBe(401);
    expect(errorOf(foreign).message).toBe('Authentication required');
  });

  it('logout destroys the session and clears the cookie', async () => {
    await member('p@example.com', { role: 'PROVIDER' });
    const cookie = await loginCookie(t.app, { host: hostFor('acme'), email: 'p@example.com' });

    const out = await t.app.inject({
      method: 'POST',
      url: '/auth/logout',
      headers: { host: hostFor('acme'), cookie },
    });
    expect(out.statusCode).toBe(204);
    expect(String(out.headers['set-cookie'])).toBe(
      'sid=; Path=/; HttpOnly; SameSite=Strict; Max-Age=0',
    );

    expect((await accounts(hostFor('acme'), cookie)).statusCode).toBe(401);

    const actions = (await auditRows(acme.id)).map((a) => a.action);
    expect(actions).toEqual(['auth.login.success', 'auth.logout']);
  });
});
