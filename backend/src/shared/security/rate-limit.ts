/**
 * src/shared/security/rate-limit.ts
 *
 * Fixed-window counters on top of Cache. Login uses two of them, one per
 * email and one per IP (auth.constants.ts holds the numbers).
 *
 * The counter is incremented first and compared after, so concurrent
 * requests cannot both read a count that is still under the limit.
 * Switching it off (tests) is decided by di.ts, not by reading NODE_ENV here.
 */

import type { Cache } from '../cache/cache';

export type RateLimitRule = {
  key: string;
  limit: number;
  windowSeconds: number;
};

export class RateLimitError extends Error {
  override readonly name = 'RateLimitError';

  constructor(
    readonly key: string,
    readonly limit: number,
    readonly windowSeconds: number,
  ) {
    super(`Rate limit exceeded for ${key}`);
  }
}

export type RateLimiterOptions = {
  prefix?: string;
  disabled?: boolean;
};

export class RateLimiter {
  private readonly prefix: string;
  private readonly disabled: boolean;

  constructor(
    private readonly cache: Cache,
    { prefix = '', disabled = false }: RateLimiterOptions = {},
  ) {
    this.prefix = prefix;
    this.disabled = disabled;
  }

  async hitOrThrow({ key, limit, windowSeconds }: RateLimitRule): Promise<void> {
    if (this.disabled) return;

    const counterKey = this.prefix ? `${this.prefix}:${key}` : key;
    const hits = await this.cache.incr(counterKey, { ttlSeconds: windowSeconds });
    if (hits > limit) throw new RateLimitError(counterKey, limit, windowSeconds);
  }
}
