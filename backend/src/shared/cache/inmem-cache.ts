/**
 * src/shared/cache/inmem-cache.ts
 *
 * Map-backed Cache for tests. Expired entries are dropped lazily on read.
 */

import type { Cache, CacheSetOptions } from './cache';

type Slot = { value: string; expiresAt?: number };

export class InMemCache implements Cache {
  private readonly slots = new Map<string, Slot>();

  private live(key: string): Slot | undefined {
    const slot = this.slots.get(key);
    if (slot?.expiresAt !== undefined && slot.expiresAt <= Date.now()) {
      this.slots.delete(key);
      return undefined;
    }
    return slot;
  }

  private static expiry(opts: CacheSetOptions): number | undefined {
    return opts.ttlSeconds ? Date.now() + opts.ttlSeconds * 1000 : undefined;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, opts: CacheSetOptions = {}): Promise<void> {
    this.slots.set(key, { value, expiresAt: InMemCache.expiry(opts) });
  }

  async del(key: string): Promise<void> {
    this.slots.delete(key);
  }

  async incr(key: string, opts: CacheSetOptions = {}): Promise<number> {
    const current = this.live(key);
    if (!current) {
      this.slots.set(key, { value: '1', expiresAt: InMemCache.expiry(opts) });
      return 1;
    }

    const count = Number(current.value) + 1;
    current.value = String(count);
    return count;
  }
}
