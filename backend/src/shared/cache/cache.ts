/**
 * src/shared/cache/cache.ts
 *
 * Key/value store for short-lived state: sessions and login rate-limit
 * counters. RedisCache backs it in production, InMemCache in tests.
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Adds one to the counter at `key` and returns the new count.
   * `ttlSeconds` applies when the counter is created; later hits keep the
   * original expiry (fixed window).
   */
  incr(key: string, opts?: CacheSetOptions): Promise<number>;
}
