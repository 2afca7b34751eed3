/**
 * src/shared/session/session.store.ts
 *
 * Server-side sessions on top of Cache (Redis in production, InMemCache in
 * tests). Expiry is the cache TTL; logout is a plain delete. Cookies are not
 * handled here, see set-session-cookie.ts and session.middleware.ts.
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import { SESSION_KEY_PREFIX, sessionDataSchema, type SessionData } from './session.types';

const sessionKey = (sessionId: string) => `${SESSION_KEY_PREFIX}:${sessionId}`;

function decode(raw: string): SessionData | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = sessionDataSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  /** Stores the session and returns its id (the cookie value). */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();
    await this.cache.set(sessionKey(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });
    return sessionId;
  }

  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(sessionKey(sessionId));
    if (raw === null) return null;

    const session = decode(raw);
    // unreadable payloads are removed so the next request does not parse them again
    if (!session) await this.destroy(sessionId);
    return session;
  }

  destroy(sessionId: string): Promise<void> {
    return this.cache.del(sessionKey(sessionId));
  }
}
