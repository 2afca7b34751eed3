/**
 * backend/src/modules/accounts/account.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Accounts module.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - No DB access (delegates to AuditWriter).
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditAccountCreated(
  writer: AuditWriter,
  data: { accountId: string; name: string; isActive: boolean; ownerUserId: string | null },
): Promise<void> {
  return writer.append('account.created', {
    accountId: data.accountId,
    name: data.name,
    isActive: data.isActive,
    ownerUserId: data.ownerUserId,
  });
}

export function auditAccountUpdated(
  writer: AuditWriter,
  data: { accountId: string; changes: Record<string, { from: unknown; to: unknown }> },
): Promise<void> {
  return writer.append('account.updated', {
    accountId: data.accountId,
    changes: data.changes,
  });
}

export function auditAccountDeleted(
  writer: AuditWriter,
  data: { accountId: string; name: string },
): Promise<void> {
  return writer.append('account.deleted', {
    accountId: data.accountId,
    name: data.name,
  });
}
