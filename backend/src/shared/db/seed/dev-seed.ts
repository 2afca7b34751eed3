/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - a tenant (if missing)
 * - a PROVIDER admin user + membership (if missing)
 * - a password identity for that admin (if missing)
 *
 * Idempotent: safe to run on every start. An existing password is never
 * overwritten (the admin may have changed it through /profile).
 */

import type { DbExecutor } from '../db';
import type { PasswordHasher } from '../../security/password-hasher';
import { logger } from '../../logger/logger';

import type { TenantRepo } from '../../../modules/tenants';
import type { UserRepo } from '../../../modules/users';
import type { MembershipRepo } from '../../../modules/memberships';
import { getPasswordHash, setPassword } from '../../../modules/auth';
import type { AuthRepo } from '../../../modules/auth';
import { provisionUserToTenant } from '../../../modules/_shared/use-cases/provision-user-to-tenant.usecase';

type DevSeedOptions = {
  tenantKey: string;
  tenantName: string;
  adminEmail: string;
  adminPassword: string;
};

export async function runDevSeed(opts: {
  db: DbExecutor;
  tenantRepo: TenantRepo;
  userRepo: UserRepo;
  membershipRepo: MembershipRepo;
  authRepo: AuthRepo;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<void> {
  const { options } = opts;
  const flow = 'seed.dev';
  const email = options.adminEmail.toLowerCase();

  await opts.db.transaction().execute(async (trx) => {
    // 1) Ensure tenant exists
    const tenant = await opts.tenantRepo.withDb(trx).ensureTenant({
      key: options.tenantKey,
      name: options.tenantName,
    });

    // 2) Ensure admin user + PROVIDER membership
    const provisioned = await provisionUserToTenant({
      trx,
      userRepo: opts.userRepo.withDb(trx),
      membershipRepo: opts.membershipRepo.withDb(trx),
      email,
      firstName: '',
      lastName: '',
      tenantId: tenant.id,
      role: 'PROVIDER',
    });

    logger.info('seed.admin.ready', {
      flow,
      tenantKey: options.tenantKey,
      tenantId: tenant.id,
      userId: provisioned.user.id,
      userCreated: provisioned.userCreated,
      membershipCreated: provisioned.membershipCreated,
      role: provisioned.membership.role,
    });

    // 3) Ensure password identity
    const existingHash = await getPasswordHash(trx, provisioned.user.id);
    if (existingHash !== undefined) return;

    await setPassword({
      authRepo: opts.authRepo.withDb(trx),
      passwordHasher: opts.passwordHasher,
      userId: provisioned.user.id,
      rawPassword: options.adminPassword,
    });

    logger.info('seed.admin.password_set', {
      flow,
      tenantId: tenant.id,
      userId: provisioned.user.id,
    });
  });
}
