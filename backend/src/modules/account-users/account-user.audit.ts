/**
 * backend/src/modules/account-users/account-user.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Account-users module.
 *
 * RULES:
 * - No DB access (delegates to AuditWriter).
 * - Never include passwords in metadata; only whether one was set.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditAccountUserCreated(
  writer: AuditWriter,
  data: {
    accountId: string;
    accountUserId: string;
    userId: string;
    email: string;
    isAdmin: boolean;
    passwordSet: boolean;
  },
): Promise<void> {
  return writer.append('account_user.created', {
    accountId: data.accountId,
    accountUserId: data.accountUserId,
    userId: data.userId,
    email: data.email,
    isAdmin: data.isAdmin,
    passwordSet: data.passwordSet,
  });
}

export function auditAccountUserUpdated(
  writer: AuditWriter,
  data: { accountId: string; accountUserId: string; userId: string; isAdmin: boolean },
): Promise<void> {
  return writer.append('account_user.updated', {
    accountId: data.accountId,
    accountUserId: data.accountUserId,
    userId: data.userId,
    isAdmin: data.isAdmin,
  });
}

export function auditAccountUserDeleted(
  writer: AuditWriter,
  data: { accountId: string; accountUserId: string; userId: string },
): Promise<void> {
  return writer.append('account_user.deleted', {
    accountId: data.accountId,
    accountUserId: data.accountUserId,
    userId: data.userId,
  });
}
