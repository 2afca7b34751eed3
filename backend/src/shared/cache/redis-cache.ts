/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Production Cache: sessions (sid → JSON) and rate-limit counters live in Redis
 *   so every backend instance sees the same state.
 *
 * NOTES:
 * - The client type is derived from createClient() instead of importing
 *   RedisClientType; that import breaks when two @redis/client copies are installed.
 * - Client 'error' events have no request attached, so they go to the global logger.
 */

import { createClient } from 'redis';
import type { Cache, CacheSetOptions } from './cache';
import { errorFields, logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });
    client.on('error', (err: Error) => {
      logger.error('redis.client_error', { flow: 'redis', ...errorFields(err) });
    });

    await client.connect();
    logger.info('redis.connected', { flow: 'redis' });
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts: CacheSetOptions = {}): Promise<void> {
    const { ttlSeconds } = opts;
    await this.client.set(key, value, ttlSeconds ? { EX: ttlSeconds } : undefined);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incr(key: string, opts: CacheSetOptions = {}): Promise<number> {
    const count = await this.client.incr(key);

    // First hit in a window opens it; later hits must not push the expiry out.
    if (opts.ttlSeconds && count === 1) {
      await this.client.expire(key, opts.ttlSeconds);
    }

    return count;
  }
}
