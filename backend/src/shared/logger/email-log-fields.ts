/**
 * backend/src/shared/logger/email-log-fields.ts
 *
 * WHY:
 * - Logs and Redis keys must never carry a raw email address. Login logs the
 *   domain plus a one-way key, and keys its per-email rate limit on the same hash.
 *
 * RULES:
 * - Pure functions, never throw.
 * - Keys are computed on the lowercased email so casing cannot split counters.
 */

import { createHash } from 'node:crypto';

export function emailKey(email: string): string {
  return createHash('sha256').update(email.toLowerCase()).digest('hex');
}

export function emailLogFields(email: string): { emailDomain: string; emailKey: string } {
  const at = email.lastIndexOf('@');
  return {
    emailDomain: at >= 0 ? email.slice(at + 1).toLowerCase() : '',
    emailKey: emailKey(email),
  };
}
