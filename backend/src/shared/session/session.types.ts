/**
 * src/shared/session/session.types.ts
 *
 * A session pins one user to one provider (tenant) and the membership they
 * logged in with. It is stored as JSON under `session:<id>` and read back
 * through the zod schema, so a payload written by an older build is dropped
 * instead of trusted.
 */

import { z } from 'zod';

export const SESSION_COOKIE_NAME = 'sid';
export const SESSION_KEY_PREFIX = 'session';

export const sessionDataSchema = z.object({
  userId: z.string().uuid(),
  tenantId: z.string().uuid(),
  /** Subdomain the session was issued on; other subdomains ignore it. */
  tenantKey: z.string().min(1),
  membershipId: z.string().uuid(),
  role: z.enum(['PROVIDER', 'CLIENT']),
  createdAt: z.string().datetime(),
});

export type SessionData = z.infer<typeof sessionDataSchema>;
