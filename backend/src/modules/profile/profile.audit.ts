/**
 * backend/src/modules/profile/profile.audit.ts
 *
 * RULES:
 * - Records which fields changed, never their password values.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditProfileUpdated(
  writer: AuditWriter,
  data: { userId: string; changedFields: string[]; passwordChanged: boolean },
): Promise<void> {
  return writer.append('profile.updated', {
    userId: data.userId,
    changedFields: data.changedFields,
    passwordChanged: data.passwordChanged,
  });
}
