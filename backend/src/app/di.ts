/**
 * src/app/di.ts
 *
 * WHY:
 * - The one place where infra is created (Postgres pool, Redis) and every
 *   module is wired. Modules receive what they need; nothing reaches for globals
 *   except the logger.
 * - Tests hand in their own `infra` (PGlite + InMemCache); close() then leaves
 *   those alone and only shuts down what was created here.
 *
 * RULES:
 * - Environment decisions (rate limiting off under test, Secure cookies in
 *   production) are made here and passed down as plain flags.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';
import type { Cache } from '../shared/cache/cache';
import { RedisCache } from '../shared/cache/redis-cache';
import { logger, type Logger } from '../shared/logger/logger';
import { RateLimiter } from '../shared/security/rate-limit';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { AuditRepo } from '../shared/audit/audit.repo';
import { SessionStore } from '../shared/session/session.store';

import { TenantRepo } from '../modules/tenants';
import { UserRepo } from '../modules/users';
import { MembershipRepo } from '../modules/memberships';
import { AuthRepo } from '../modules/auth';
import { AccountRepo } from '../modules/accounts';
import { AccountUserRepo } from '../modules/account-users';

import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';
import { createAccountModule, type AccountModule } from '../modules/accounts/account.module';
import {
  createAccountUserModule,
  type AccountUserModule,
} from '../modules/account-users/account-user.module';
import { createProfileModule, type ProfileModule } from '../modules/profile/profile.module';

export type AppInfra = {
  db?: Db;
  cache?: Cache;
};

/** Every repo bound to the root executor; services rebind with withDb(trx). */
export type AppRepos = {
  tenantRepo: TenantRepo;
  userRepo: UserRepo;
  membershipRepo: MembershipRepo;
  authRepo: AuthRepo;
  accountRepo: AccountRepo;
  accountUserRepo: AccountUserRepo;
};

export type AppDeps = {
  db: Db;
  cache: Cache;
  logger: Logger;
  rateLimiter: RateLimiter;
  passwordHasher: PasswordHasher;
  auditRepo: AuditRepo;
  sessionStore: SessionStore;
  repos: AppRepos;

  auth: AuthModule;
  accounts: AccountModule;
  accountUsers: AccountUserModule;
  profile: ProfileModule;

  close: () => Promise<void>;
};

function buildRepos(db: Db): AppRepos {
  return {
    tenantRepo: new TenantRepo(db),
    userRepo: new UserRepo(db),
    membershipRepo: new MembershipRepo(db),
    authRepo: new AuthRepo(db),
    accountRepo: new AccountRepo(db),
    accountUserRepo: new AccountUserRepo(db),
  };
}

export async function buildDeps(config: AppConfig, infra: AppInfra = {}): Promise<AppDeps> {
  const closers: Array<() => Promise<void>> = [];

  const db = infra.db ?? createDb(config.databaseUrl);
  if (!infra.db) closers.push(() => db.destroy());

  let cache = infra.cache;
  if (!cache) {
    const redis = await RedisCache.connect(config.redisUrl);
    closers.push(() => redis.close());
    cache = redis;
  }

  const passwordHasher = new BcryptPasswordHasher({ cost: config.bcryptCost });
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });
  const auditRepo = new AuditRepo(db);
  const sessionStore = new SessionStore(cache, config.sessionTtlSeconds);
  const repos = buildRepos(db);

  const auth = createAuthModule({
    db,
    authRepo: repos.authRepo,
    passwordHasher,
    logger,
    rateLimiter,
    auditRepo,
    sessionStore,
    isProduction: config.nodeEnv === 'production',
  });

  const accounts = createAccountModule({
    db,
    logger,
    auditRepo,
    accountRepo: repos.accountRepo,
    accountUserRepo: repos.accountUserRepo,
    userRepo: repos.userRepo,
    membershipRepo: repos.membershipRepo,
  });

  const accountUsers = createAccountUserModule({
    db,
    logger,
    auditRepo,
    passwordHasher,
    accountRepo: repos.accountRepo,
    accountUserRepo: repos.accountUserRepo,
    userRepo: repos.userRepo,
    membershipRepo: repos.membershipRepo,
    authRepo: repos.authRepo,
    allowEmpty: config.accountUsers.allowEmpty,
  });

  const profile = createProfileModule({
    db,
    logger,
    auditRepo,
    passwordHasher,
    userRepo: repos.userRepo,
    authRepo: repos.authRepo,
    successUrl: config.profile.successUrl,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    passwordHasher,
    auditRepo,
    sessionStore,
    repos,
    auth,
    accounts,
    accountUsers,
    profile,
    close: async () => {
      // redis first, then the pool (reverse of creation)
      for (const close of closers.reverse()) await close();
    },
  };
}
