import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { SessionStore } from '../../../../src/shared/session/session.store';
import type { SessionData } from '../../../../src/shared/session/session.types';

const session: SessionData = {
  userId: '11111111-1111-4111-8111-111111111111',
  tenantId: '22222222-2222-4222-8222-222222222222',
  tenantKey: 'acme',
  membershipId: '33333333-3333-4333-8333-333333333333',
  role: 'PROVIDER',
  createdAt: '2024-01-01T00:00:00.000Z',
};

describe('SessionStore', () => {
  it('reads back what it created until destroyed', async () => {
    const store = new SessionStore(new InMemCache(), 3600);

    const id = await store.create(session);
    expect(await store.get(id)).toEqual(session);

    await store.destroy(id);
    expect(await store.get(id)).toBeNull();
  });

  it('returns null for an unknown id', async () => {
    const store = new SessionStore(new InMemCache(), 3600);
    expect(await store.get('missing')).toBeNull();
  });

  it('drops a payload that is not a valid session', async () => {
    const cache = new InMemCache();
    const store = new SessionStore(cache, 3600);
    await cache.set('session:broken', JSON.stringify({ ...session, role: 'ADMIN' }));
    await cache.set('session:garbled', '{not json');

    expect(await store.get('broken')).toBeNull();
    expect(await store.get('garbled')).toBeNull();
    expect(await cache.get('session:broken')).toBeNull();
    expect(await cache.get('session:garbled')).toBeNull();
  });
});
