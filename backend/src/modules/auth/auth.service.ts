/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point for password login and logout. Login is a deep flow
 *   (flows/login); logout is small enough to live here.
 *
 * RULES:
 * - Raw passwords never reach a log line or an audit.
 */

import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestMeta } from '../../shared/http/request-meta';
import type { AuthResult } from './auth.types';
import { auditLogout } from './auth.audit';
import {
  executeLoginFlow,
  type LoginDeps,
  type LoginParams,
} from './flows/login/execute-login-flow';

export class AuthService {
  constructor(private readonly deps: LoginDeps) {}

  login(params: LoginParams): Promise<{ result: AuthResult; sessionId: string }> {
    return executeLoginFlow(this.deps, params);
  }

  /**
   * Idempotent: no cookie, or a cookie whose session already expired, is a
   * successful logout without an audit.
   */
  async logout(sessionId: string | null, meta: RequestMeta): Promise<void> {
    if (!sessionId) return;

    const { sessionStore, auditRepo, logger } = this.deps;
    const session = await sessionStore.get(sessionId);
    await sessionStore.destroy(sessionId);
    if (!session) return;

    const audit = new AuditWriter(auditRepo, {
      requestId: meta.requestId,
      ip: meta.ip,
      userAgent: meta.userAgent,
      tenantId: session.tenantId,
      userId: session.userId,
      membershipId: session.membershipId,
    });
    await auditLogout(audit, session.userId);

    logger.info({
      msg: 'auth.logout.success',
      flow: 'auth.logout',
      requestId: meta.requestId,
      tenantId: session.tenantId,
      userId: session.userId,
    });
  }
}

