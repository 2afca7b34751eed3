/**
 * src/modules/_shared/use-cases/provision-user-to-tenant.audit.ts
 *
 * WHY:
 * - Callers of provisionUserToTenant emit the same two audits from its flags.
 *
 * RULES:
 * - No DB access (delegates to AuditWriter).
 */

import type { AuditWriter } from '../../../shared/audit/audit.writer';
import type { ProvisionResult } from './provision-user-to-tenant.usecase';

export async function writeProvisionAudits(
  writer: AuditWriter,
  result: ProvisionResult,
): Promise<void> {
  if (result.userCreated) {
    await writer.append('user.created', {
      userId: result.user.id,
      email: result.user.email,
    });
  }

  if (result.membershipCreated) {
    await writer.append('membership.created', {
      membershipId: result.membership.id,
      userId: result.user.id,
      role: result.membership.role,
    });
  }
}
