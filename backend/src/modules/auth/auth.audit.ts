/**
 * src/modules/auth/auth.audit.ts
 *
 * Audit payloads for sign-in and sign-out. Passwords and hashes never appear
 * in metadata; the email does, since the audit trail is the place to look it up.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { MembershipRole } from '../memberships';

export type LoginSucceeded = {
  userId: string;
  email: string;
  membershipId: string;
  role: MembershipRole;
};

export type LoginFailed = { email: string; reason: string };

export const auditLoginSuccess = (writer: AuditWriter, data: LoginSucceeded): Promise<void> =>
  writer.append('auth.login.success', { ...data });

export const auditLoginFailed = (writer: AuditWriter, data: LoginFailed): Promise<void> =>
  writer.append('auth.login.failed', { email: data.email, reason: data.reason });

export const auditLogout = (writer: AuditWriter, userId: string): Promise<void> =>
  writer.append('auth.logout', { userId });
