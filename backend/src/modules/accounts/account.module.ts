/**
 * backend/src/modules/accounts/account.module.ts
 *
 * WHY:
 * - Encapsulates Accounts module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { UserRepo } from '../users';
import type { MembershipRepo } from '../memberships';
import type { AccountUserRepo } from '../account-users';

import { AccountRepo } from './dal/account.repo';
import { AccountService } from './account.service';
import { AccountController } from './account.controller';
import { registerAccountRoutes } from './account.routes';

export type AccountModule = ReturnType<typeof createAccountModule>;

export function createAccountModule(deps: {
  db: DbExecutor;
  logger: Logger;
  auditRepo: AuditRepo;
  accountRepo: AccountRepo;
  accountUserRepo: AccountUserRepo;
  userRepo: UserRepo;
  membershipRepo: MembershipRepo;
}) {
  const accountService = new AccountService(deps);
  const controller = new AccountController(accountService);

  return {
    accountService,
    registerRoutes(app: FastifyInstance) {
      registerAccountRoutes(app, controller);
    },
  };
}
