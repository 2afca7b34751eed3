/**
 * src/shared/audit/audit.types.ts
 *
 * Shapes of the audit_events trail. Shared code only: module types are not
 * imported here.
 */

const AUDIT_ACTIONS = [
  'auth.login.success',
  'auth.login.failed',
  'auth.logout',
  'user.created',
  'membership.created',
  'account.created',
  'account.updated',
  'account.deleted',
  'account_user.created',
  'account_user.updated',
  'account_user.deleted',
  'profile.updated',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export type AuditMetadata = Record<string, unknown>;

/**
 * Who and where. Login fills this in step by step (tenant, then user and
 * membership), so every field may still be null when an event is written.
 */
export type AuditContext = {
  tenantId: string | null;
  userId: string | null;
  membershipId: string | null;
  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
