import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

describe('GET /health', () => {
  let t: Awaited<ReturnType<typeof buildTestApp>>;

  beforeAll(async () => {
    t = await buildTestApp();
  });

  afterAll(async () => {
    await t.close();
  });

  const health = (host: string) =>
    t.app.inject({ method: 'GET', url: '/health', headers: { host } });

  it('reports env, service and the tenant key of the host', async () => {
    const res = await health('acme.localhost:3000');

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      env: 'test',
      service: 'account-desk-backend',
      requestId: expect.any(String),
      tenantKey: 'acme',
    });
  });

  it('answers on the bare host with a null tenant key', async () => {
    const res = await health('localhost:3000');

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, tenantKey: null });
  });

  it('gives each request its own id', async () => {
    const first = (await health('acme.localhost')).json<{ requestId: string }>();
    const second = (await health('acme.localhost')).json<{ requestId: string }>();

    expect(first.requestId).not.toBe(second.requestId);
  });

  it('answers unknown routes with the standard error shape', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });
});
