/**
 * backend/src/modules/account-users/account-user.module.ts
 *
 * WHY:
 * - Encapsulates Account-users module wiring.
 * - DI creates infra and shared repos; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AccountRepo } from '../accounts';
import type { UserRepo } from '../users';
import type { MembershipRepo } from '../memberships';
import type { AuthRepo } from '../auth';

import type { AccountUserRepo } from './dal/account-user.repo';
import { AccountUserService } from './account-user.service';
import { AccountUserController } from './account-user.controller';
import { registerAccountUserRoutes } from './account-user.routes';

export type AccountUserModule = ReturnType<typeof createAccountUserModule>;

export function createAccountUserModule(deps: {
  db: DbExecutor;
  logger: Logger;
  auditRepo: AuditRepo;
  passwordHasher: PasswordHasher;
  accountRepo: AccountRepo;
  accountUserRepo: AccountUserRepo;
  userRepo: UserRepo;
  membershipRepo: MembershipRepo;
  authRepo: AuthRepo;
  allowEmpty: boolean;
}) {
  const accountUserService = new AccountUserService(deps);
  const controller = new AccountUserController(accountUserService);

  return {
    accountUserService,
    registerRoutes(app: FastifyInstance) {
      registerAccountUserRoutes(app, controller);
    },
  };
}
