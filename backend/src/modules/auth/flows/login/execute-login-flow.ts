/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - Password login end to end: throttle → resolve tenant → verify → gate
 *   membership → audit → session.
 * - The transaction returns a verdict instead of throwing for a rejected login.
 *   Nothing was written on that path, so the tx commits empty and the
 *   auth.login.failed audit goes through the plain (non-trx) repo afterwards.
 * - A hash stored at an outdated bcrypt cost is replaced right after it
 *   verified, inside the same tx as the success audit.
 *
 * RULES:
 * - Unknown user, missing password identity and wrong password all answer
 *   invalidCredentials; only the audit `reason` tells them apart.
 * - Tenant resolution errors (400/404/403) are not audited: there is no tenant
 *   to attach them to.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import type { SessionStore } from '../../../../shared/session/session.store';
import type { AppError } from '../../../../shared/http/errors';
import type { RequestMeta } from '../../../../shared/http/request-meta';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { emailKey, emailLogFields } from '../../../../shared/logger/email-log-fields';

import { resolveTenant, type Tenant } from '../../../tenants';
import { getUserByEmail, type User } from '../../../users';
import { getMembershipByTenantAndUser, type Membership } from '../../../memberships';

import { AuthErrors } from '../../auth.errors';
import { LOGIN_RATE_LIMITS } from '../../auth.constants';
import type { AuthResult } from '../../auth.types';
import type { LoginInput } from '../../auth.schemas';
import { auditLoginFailed, auditLoginSuccess } from '../../auth.audit';
import type { AuthRepo } from '../../dal/auth.repo';
import { setPassword } from '../../helpers/set-password';
import { checkLoginMembership } from '../../policies/login-membership-gating.policy';
import { getPasswordHash } from '../../queries/auth.queries';

export type LoginParams = LoginInput & { meta: RequestMeta };

export type LoginDeps = {
  db: DbExecutor;
  authRepo: AuthRepo;
  passwordHasher: PasswordHasher;
  logger: Logger;
  rateLimiter: RateLimiter;
  auditRepo: AuditRepo;
  sessionStore: SessionStore;
};

type Rejected = {
  ok: false;
  tenantId: string;
  userId: string | null;
  membershipId: string | null;
  reason: string;
  error: AppError;
};

type Accepted = { ok: true; tenant: Tenant; user: User; membership: Membership };

export async function executeLoginFlow(
  deps: LoginDeps,
  params: LoginParams,
): Promise<{ result: AuthResult; sessionId: string }> {
  const { meta } = params;
  const email = params.email.toLowerCase();
  const requestAudit = { requestId: meta.requestId, ip: meta.ip, userAgent: meta.userAgent };

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: meta.requestId,
    tenantKey: meta.tenantKey,
    ...emailLogFields(email),
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey(email)}`,
    ...LOGIN_RATE_LIMITS.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({ key: `login:ip:${meta.ip}`, ...LOGIN_RATE_LIMITS.perIp });

  const outcome = await deps.db.transaction().execute(async (trx): Promise<Accepted | Rejected> => {
    const tenant = await resolveTenant(trx, meta.tenantKey);

    const reject = (
      reason: string,
      error: AppError,
      ids: { userId?: string; membershipId?: string } = {},
    ): Rejected => ({
      ok: false,
      tenantId: tenant.id,
      userId: ids.userId ?? null,
      membershipId: ids.membershipId ?? null,
      reason,
      error,
    });

    const user = await getUserByEmail(trx, email);
    if (!user) return reject('user_not_found', AuthErrors.invalidCredentials());

    const storedHash = await getPasswordHash(trx, user.id);
    if (storedHash === undefined) {
      return reject('no_password_identity', AuthErrors.invalidCredentials(), { userId: user.id });
    }
    if (!(await deps.passwordHasher.verify(params.password, storedHash))) {
      return reject('wrong_password', AuthErrors.invalidCredentials(), { userId: user.id });
    }

    const found = await getMembershipByTenantAndUser(trx, { tenantId: tenant.id, userId: user.id });
    const verdict = checkLoginMembership(found);
    if (!verdict.allowed) {
      return reject(verdict.reason, verdict.error, { userId: user.id, membershipId: found?.id });
    }
    const { membership } = verdict;

    if (deps.passwordHasher.needsRehash(storedHash)) {
      await setPassword({
        authRepo: deps.authRepo.withDb(trx),
        passwordHasher: deps.passwordHasher,
        userId: user.id,
        rawPassword: params.password,
      });
    }

    const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
      ...requestAudit,
      tenantId: tenant.id,
      userId: user.id,
      membershipId: membership.id,
    });
    await auditLoginSuccess(audit, {
      userId: user.id,
      email: user.email,
      membershipId: membership.id,
      role: membership.role,
    });

    return { ok: true, tenant, user, membership };
  });

  if (!outcome.ok) {
    const audit = new AuditWriter(deps.auditRepo, {
      ...requestAudit,
      tenantId: outcome.tenantId,
      userId: outcome.userId,
      membershipId: outcome.membershipId,
    });
    await auditLoginFailed(audit, { email, reason: outcome.reason });

    deps.logger.warn({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: meta.requestId,
      tenantId: outcome.tenantId,
      reason: outcome.reason,
    });
    throw outcome.error;
  }

  const { tenant, user, membership } = outcome;
  const sessionId = await deps.sessionStore.create({
    userId: user.id,
    tenantId: tenant.id,
    tenantKey: tenant.key,
    membershipId: membership.id,
    role: membership.role,
    createdAt: new Date().toISOString(),
  });

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: meta.requestId,
    tenantId: tenant.id,
    userId: user.id,
    membershipId: membership.id,
  });

  return {
    sessionId,
    result: {
      status: 'AUTHENTICATED',
      user: {
        id: user.id,
        email: user.email,
        username: user.username,
        firstName: user.firstName,
        lastName: user.lastName,
      },
      membership: { id: membership.id, role: membership.role },
    },
  };
}
