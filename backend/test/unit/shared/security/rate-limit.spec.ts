import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimitError, RateLimiter } from '../../../../src/shared/security/rate-limit';

const rule = { key: 'login:ip:10.0.0.1', limit: 2, windowSeconds: 900 };

describe('RateLimiter', () => {
  it('lets hits through up to the limit, then throws with the prefixed key', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });

    await limiter.hitOrThrow(rule);
    await limiter.hitOrThrow(rule);

    const err = await limiter.hitOrThrow(rule).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err).toMatchObject({ key: 'rl:login:ip:10.0.0.1', limit: 2, windowSeconds: 900 });
  });

  it('counts keys separately', async () => {
    const limiter = new RateLimiter(new InMemCache());

    await limiter.hitOrThrow({ ...rule, limit: 1 });
    await expect(
      limiter.hitOrThrow({ ...rule, key: 'login:ip:10.0.0.2', limit: 1 }),
    ).resolves.toBeUndefined();
  });

  it('never throws when disabled', async () => {
    const limiter = new RateLimiter(new InMemCache(), { disabled: true });

    for (let i = 0; i < 5; i += 1) await limiter.hitOrThrow(rule);
    await expect(limiter.hitOrThrow(rule)).resolves.toBeUndefined();
  });
});
