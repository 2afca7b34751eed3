/**
 * backend/src/modules/account-users/account-user.service.ts
 *
 * WHY:
 * - Orchestrates the account-user pages of one account.
 * - Only place in the module allowed to start transactions.
 *
 * RULES:
 * - The parent account comes from the route and must be visible to the actor.
 * - Account users are looked up within that account only.
 * - Managing needs PROVIDER, or an admin account-user row on that account.
 * - Every write touches the parent account (updated_by/updated_at) and
 *   audits inside the same tx.
 * - Editing a user's email or names is refused for users shared with another
 *   provider, and for PROVIDER users when the actor is a CLIENT.
 * - Postgres aborts a tx on unique violations, so conflicts are checked
 *   with reads first.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RequestMeta } from '../../shared/http/request-meta';

import { resolveActorTenant } from '../_shared/use-cases/resolve-actor-tenant.usecase';
import { provisionUserToTenant } from '../_shared/use-cases/provision-user-to-tenant.usecase';
import { writeProvisionAudits } from '../_shared/use-cases/provision-user-to-tenant.audit';
import { AuditWriter } from '../../shared/audit/audit.writer';
import { assertAccountVisible, getVisibleAccount, toAccountView } from '../accounts';
import type { AccountActor, AccountRepo, AccountView } from '../accounts';
import { getUserByEmail } from '../users';
import type { UserRepo } from '../users';
import { listMembershipsOfUser, type MembershipRepo } from '../memberships';
import { setPassword } from '../auth';
import type { AuthRepo } from '../auth';

import {
  getAccountUser,
  getAccountUserForUser,
  listAccountUsers,
  toAccountUserView,
} from './queries/account-user.queries';
import {
  assertAccountUserExists,
  assertCanEditUserIdentity,
  assertCanManageAccountUsers,
  assertListAllowed,
} from './policies/account-user-access.policy';
import {
  auditAccountUserCreated,
  auditAccountUserDeleted,
  auditAccountUserUpdated,
} from './account-user.audit';
import { AccountUserErrors } from './account-user.errors';
import type { AccountUserAddFormInput, AccountUserFormInput } from './account-user.schemas';
import type { AccountUserView } from './account-user.types';
import type { AccountUserRepo } from './dal/account-user.repo';

export type AccountUserRequest = Readonly<{
  actor: AccountActor;
  meta: RequestMeta;
}>;

export type AccountUserRef = Readonly<{
  accountId: string;
  accountUserId: string;
}>;

export class AccountUserService {
  constructor(
    private readonly deps: {
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
    },
  ) {}

  async listAccountUsers(
    req: AccountUserRequest,
    accountId: string,
  ): Promise<{ account: AccountView; accountUsers: AccountUserView[] }> {
    const account = await this.loadAccount(this.deps.db, req, accountId);

    const accountUsers = await listAccountUsers(this.deps.db, account.id);
    assertListAllowed(accountUsers, this.deps.allowEmpty);

    return { account, accountUsers: accountUsers.map(toAccountUserView) };
  }

  async getAccountUserDetail(
    req: AccountUserRequest,
    ref: AccountUserRef,
  ): Promise<{ account: AccountView; accountUser: AccountUserView }> {
    const account = await this.loadAccount(this.deps.db, req, ref.accountId);
    const accountUser = await this.loadAccountUser(this.deps.db, account.id, ref.accountUserId);

    return { account, accountUser };
  }

  /**
   * Loads the parent account for the add form (managers only).
   */
  async getManagedAccount(req: AccountUserRequest, accountId: string): Promise<AccountView> {
    return this.loadManagedAccount(this.deps.db, req, accountId);
  }

  /**
   * Loads an account user for the edit / delete pages (managers only).
   */
  async getManagedAccountUser(
    req: AccountUserRequest,
    ref: AccountUserRef,
  ): Promise<{ account: AccountView; accountUser: AccountUserView }> {
    const account = await this.loadManagedAccount(this.deps.db, req, ref.accountId);
    const accountUser = await this.loadAccountUser(this.deps.db, account.id, ref.accountUserId);

    return { account, accountUser };
  }

  async createAccountUser(
    req: AccountUserRequest,
    accountId: string,
    input: AccountUserAddFormInput,
  ): Promise<{ accountUserId: string }> {
    const now = new Date();
    const { actor, meta } = req;
    const email = input.email.toLowerCase();

    this.deps.logger.info({
      msg: 'account_users.create.start',
      flow: 'account_users.create',
      requestId: meta.requestId,
      tenantKey: meta.tenantKey,
      accountId,
    });

    const result = await this.deps.db.transaction().execute(async (trx) => {
      const account = await this.loadManagedAccount(trx, req, accountId);
      const audit = AuditWriter.forActor(this.deps.auditRepo.withDb(trx), actor, meta);

      const provisioned = await provisionUserToTenant({
        trx,
        userRepo: this.deps.userRepo.withDb(trx),
        membershipRepo: this.deps.membershipRepo.withDb(trx),
        email,
        firstName: input.firstName,
        lastName: input.lastName,
        tenantId: account.tenantId,
        role: 'CLIENT',
      });

      const passwordGiven = input.password1.length > 0;
      if (passwordGiven && !provisioned.userCreated) {
        throw AccountUserErrors.passwordOnlyForNewUser({ accountId: account.id });
      }

      const existing = await getAccountUserForUser(trx, {
        accountId: account.id,
        userId: provisioned.user.id,
      });
      if (existing) {
        throw AccountUserErrors.alreadyMember({
          accountId: account.id,
          accountUserId: existing.id,
        });
      }

      const created = await this.deps.accountUserRepo.withDb(trx).insertAccountUser({
        accountId: account.id,
        userId: provisioned.user.id,
        isAdmin: input.isAdmin,
      });

      if (passwordGiven) {
        await setPassword({
          authRepo: this.deps.authRepo.withDb(trx),
          passwordHasher: this.deps.passwordHasher,
          userId: provisioned.user.id,
          rawPassword: input.password1,
        });
      }

      await this.deps.accountRepo.withDb(trx).touchAccount({
        accountId: account.id,
        actorUserId: actor.userId,
        now,
      });

      await writeProvisionAudits(audit, provisioned);
      await auditAccountUserCreated(audit, {
        accountId: account.id,
        accountUserId: created.id,
        userId: provisioned.user.id,
        email: provisioned.user.email,
        isAdmin: input.isAdmin,
        passwordSet: passwordGiven,
      });

      return { accountUserId: created.id, userId: provisioned.user.id };
    });

    this.deps.logger.info({
      msg: 'account_users.create.success',
      flow: 'account_users.create',
      requestId: meta.requestId,
      tenantId: actor.tenantId,
      accountId,
      accountUserId: result.accountUserId,
      userId: result.userId,
    });

    return { accountUserId: result.accountUserId };
  }

  async updateAccountUser(
    req: AccountUserRequest,
    ref: AccountUserRef,
    input: AccountUserFormInput,
  ): Promise<void> {
    const now = new Date();
    const { actor, meta } = req;
    const email = input.email.toLowerCase();

    this.deps.logger.info({
      msg: 'account_users.update.start',
      flow: 'account_users.update',
      requestId: meta.requestId,
      tenantKey: meta.tenantKey,
      accountId: ref.accountId,
      accountUserId: ref.accountUserId,
    });

    await this.deps.db.transaction().execute(async (trx) => {
      const account = await this.loadManagedAccount(trx, req, ref.accountId);
      const accountUser = await this.loadAccountUser(trx, account.id, ref.accountUserId);

      const { user } = accountUser;
      const identityChanged =
        email !== user.email ||
        input.firstName !== user.firstName ||
        input.lastName !== user.lastName;

      if (identityChanged) {
        const memberships = await listMembershipsOfUser(trx, accountUser.userId);
        assertCanEditUserIdentity(actor, memberships, { accountUserId: accountUser.id });

        const emailOwner = await getUserByEmail(trx, email);
        if (emailOwner && emailOwner.id !== accountUser.userId) {
          throw AccountUserErrors.emailInUse({ accountUserId: accountUser.id });
        }

        await this.deps.userRepo.withDb(trx).updateUser(accountUser.userId, {
          email,
          firstName: input.firstName,
          lastName: input.lastName,
        });
      }

      await this.deps.accountUserRepo.withDb(trx).updateIsAdmin({
        accountUserId: accountUser.id,
        isAdmin: input.isAdmin,
        now,
      });

      await this.deps.accountRepo.withDb(trx).touchAccount({
        accountId: account.id,
        actorUserId: actor.userId,
        now,
      });

      const audit = AuditWriter.forActor(this.deps.auditRepo.withDb(trx), actor, meta);
      await auditAccountUserUpdated(audit, {
        accountId: account.id,
        accountUserId: accountUser.id,
        userId: accountUser.userId,
        isAdmin: input.isAdmin,
      });
    });

    this.deps.logger.info({
      msg: 'account_users.update.success',
      flow: 'account_users.update',
      requestId: meta.requestId,
      tenantId: actor.tenantId,
      accountId: ref.accountId,
      accountUserId: ref.accountUserId,
    });
  }

  async deleteAccountUser(req: AccountUserRequest, ref: AccountUserRef): Promise<void> {
    const now = new Date();
    const { actor, meta } = req;

    this.deps.logger.info({
      msg: 'account_users.delete.start',
      flow: 'account_users.delete',
      requestId: meta.requestId,
      tenantKey: meta.tenantKey,
      accountId: ref.accountId,
      accountUserId: ref.accountUserId,
    });

    await this.deps.db.transaction().execute(async (trx) => {
      const account = await this.loadManagedAccount(trx, req, ref.accountId);
      const accountUser = await this.loadAccountUser(trx, account.id, ref.accountUserId);

      await this.deps.accountUserRepo.withDb(trx).deleteAccountUser(accountUser.id);

      await this.deps.accountRepo.withDb(trx).touchAccount({
        accountId: account.id,
        actorUserId: actor.userId,
        now,
      });

      const audit = AuditWriter.forActor(this.deps.auditRepo.withDb(trx), actor, meta);
      await auditAccountUserDeleted(audit, {
        accountId: account.id,
        accountUserId: accountUser.id,
        userId: accountUser.userId,
      });
    });

    this.deps.logger.info({
      msg: 'account_users.delete.success',
      flow: 'account_users.delete',
      requestId: meta.requestId,
      tenantId: actor.tenantId,
      accountId: ref.accountId,
      accountUserId: ref.accountUserId,
    });
  }

  private async loadAccount(
    db: DbExecutor,
    req: AccountUserRequest,
    accountId: string,
  ): Promise<AccountView> {
    await resolveActorTenant(db, req.meta.tenantKey, req.actor);

    const account = await getVisibleAccount(db, req.actor, accountId);
    assertAccountVisible(account, accountId);

    return toAccountView(account);
  }

  private async loadManagedAccount(
    db: DbExecutor,
    req: AccountUserRequest,
    accountId: string,
  ): Promise<AccountView> {
    const account = await this.loadAccount(db, req, accountId);

    const actorAccountUser =
      req.actor.role === 'PROVIDER'
        ? undefined
        : await getAccountUserForUser(db, { accountId: account.id, userId: req.actor.userId });
    assertCanManageAccountUsers(req.actor, actorAccountUser, account.id);

    return account;
  }

  private async loadAccountUser(
    db: DbExecutor,
    accountId: string,
    accountUserId: string,
  ): Promise<AccountUserView> {
    const accountUser = await getAccountUser(db, { accountId, accountUserId });
    assertAccountUserExists(accountUser, { accountId, accountUserId });

    return toAccountUserView(accountUser);
  }
}
