/**
 * backend/src/modules/profile/profile.module.ts
 *
 * WHY:
 * - Encapsulates Profile module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { UserRepo } from '../users';
import type { AuthRepo } from '../auth';

import { ProfileService } from './profile.service';
import { ProfileController } from './profile.controller';
import { registerProfileRoutes } from './profile.routes';

export type ProfileModule = ReturnType<typeof createProfileModule>;

export function createProfileModule(deps: {
  db: DbExecutor;
  logger: Logger;
  auditRepo: AuditRepo;
  passwordHasher: PasswordHasher;
  userRepo: UserRepo;
  authRepo: AuthRepo;
  successUrl: string;
}) {
  const profileService = new ProfileService({
    db: deps.db,
    logger: deps.logger,
    auditRepo: deps.auditRepo,
    passwordHasher: deps.passwordHasher,
    userRepo: deps.userRepo,
    authRepo: deps.authRepo,
  });

  const controller = new ProfileController(profileService, deps.successUrl);

  return {
    profileService,
    registerRoutes(app: FastifyInstance) {
      registerProfileRoutes(app, controller);
    },
  };
}
