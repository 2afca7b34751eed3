/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds the audit context once so services only pass action + metadata.
 * - Two ways in:
 *     login           → new AuditWriter(repo, { requestId, ip, userAgent, tenantId, ... })
 *     signed-in pages → AuditWriter.forActor(repo, actor, meta)
 *
 * RULES:
 * - No module types imported here; actors are accepted structurally.
 */

import type { AuditRepo } from './audit.repo';
import type { AuditAction, AuditContext, AuditMetadata } from './audit.types';
import type { RequestMeta } from '../http/request-meta';

const EMPTY_CONTEXT: AuditContext = {
  tenantId: null,
  userId: null,
  membershipId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

export type AuditActor = Readonly<{ tenantId: string; userId: string; membershipId: string }>;

export class AuditWriter {
  private readonly context: Readonly<AuditContext>;

  constructor(
    private readonly repo: AuditRepo,
    context: Partial<AuditContext> = {},
  ) {
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  static forActor(repo: AuditRepo, actor: AuditActor, meta: RequestMeta): AuditWriter {
    return new AuditWriter(repo, {
      tenantId: actor.tenantId,
      userId: actor.userId,
      membershipId: actor.membershipId,
      requestId: meta.requestId,
      ip: meta.ip,
      userAgent: meta.userAgent,
    });
  }

  append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    return this.repo.append({ ...this.context, action, metadata });
  }
}
