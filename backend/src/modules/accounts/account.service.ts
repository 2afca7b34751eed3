/**
 * backend/src/modules/accounts/account.service.ts
 *
 * WHY:
 * - Orchestrates the account pages: list, detail, create, update, delete.
 * - Only place in the module allowed to start transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Every request re-checks that the session belongs to the host's provider.
 * - Accounts the actor cannot see are "not found" (never 403).
 * - Writes stamp updated_by/updated_at and audit inside the same tx.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { RequestMeta } from '../../shared/http/request-meta';

import { resolveActorTenant } from '../_shared/use-cases/resolve-actor-tenant.usecase';
import { provisionUserToTenant } from '../_shared/use-cases/provision-user-to-tenant.usecase';
import { writeProvisionAudits } from '../_shared/use-cases/provision-user-to-tenant.audit';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { UserRepo } from '../users';
import type { MembershipRepo } from '../memberships';
import {
  auditAccountUserCreated,
  listAccountUsers,
  toAccountUserView,
} from '../account-users';
import type { AccountUserRepo, AccountUserView } from '../account-users';

import { getVisibleAccount, listVisibleAccounts, toAccountView } from './queries/account.queries';
import { assertAccountVisible } from './policies/account-access.policy';
import { auditAccountCreated, auditAccountDeleted, auditAccountUpdated } from './account.audit';
import type { AccountAddFormInput, AccountFormInput } from './account.schemas';
import type { AccountActor, AccountView } from './account.types';
import type { AccountRepo } from './dal/account.repo';

export type AccountRequest = Readonly<{
  actor: AccountActor;
  meta: RequestMeta;
}>;

export type AccountDetail = {
  account: AccountView;
  accountUsers: AccountUserView[];
};

export class AccountService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      auditRepo: AuditRepo;
      accountRepo: AccountRepo;
      accountUserRepo: AccountUserRepo;
      userRepo: UserRepo;
      membershipRepo: MembershipRepo;
    },
  ) {}

  async listAccounts(req: AccountRequest): Promise<AccountView[]> {
    await resolveActorTenant(this.deps.db, req.meta.tenantKey, req.actor);

    const accounts = await listVisibleAccounts(this.deps.db, req.actor);
    return accounts.map(toAccountView);
  }

  async getAccountDetail(req: AccountRequest, accountId: string): Promise<AccountDetail> {
    const account = await this.getAccount(req, accountId);
    const accountUsers = await listAccountUsers(this.deps.db, account.id);

    return { account, accountUsers: accountUsers.map(toAccountUserView) };
  }

  /**
   * Loads one visible account (edit / delete pages).
   */
  async getAccount(req: AccountRequest, accountId: string): Promise<AccountView> {
    await resolveActorTenant(this.deps.db, req.meta.tenantKey, req.actor);

    const account = await getVisibleAccount(this.deps.db, req.actor, accountId);
    assertAccountVisible(account, accountId);

    return toAccountView(account);
  }

  async createAccount(
    req: AccountRequest,
    input: AccountAddFormInput,
  ): Promise<{ accountId: string }> {
    const { actor, meta } = req;

    this.deps.logger.info({
      msg: 'accounts.create.start',
      flow: 'accounts.create',
      requestId: meta.requestId,
      tenantKey: meta.tenantKey,
      userId: actor.userId,
    });

    const result = await this.deps.db.transaction().execute(async (trx) => {
      const tenant = await resolveActorTenant(trx, meta.tenantKey, actor);
      const audit = AuditWriter.forActor(this.deps.auditRepo.withDb(trx), actor, meta);

      const created = await this.deps.accountRepo.withDb(trx).insertAccount({
        tenantId: tenant.id,
        name: input.name,
        isActive: input.isActive,
        actorUserId: actor.userId,
      });

      let ownerUserId: string | null = null;

      if (input.ownerEmail) {
        const provisioned = await provisionUserToTenant({
          trx,
          userRepo: this.deps.userRepo.withDb(trx),
          membershipRepo: this.deps.membershipRepo.withDb(trx),
          email: input.ownerEmail.toLowerCase(),
          firstName: input.ownerFirstName ?? '',
          lastName: input.ownerLastName ?? '',
          tenantId: tenant.id,
          role: 'CLIENT',
        });

        await writeProvisionAudits(audit, provisioned);

        const owner = await this.deps.accountUserRepo.withDb(trx).insertAccountUser({
          accountId: created.id,
          userId: provisioned.user.id,
          isAdmin: true,
        });

        await auditAccountUserCreated(audit, {
          accountId: created.id,
          accountUserId: owner.id,
          userId: provisioned.user.id,
          email: provisioned.user.email,
          isAdmin: true,
          passwordSet: false,
        });

        ownerUserId = provisioned.user.id;
      }

      await auditAccountCreated(audit, {
        accountId: created.id,
        name: input.name,
        isActive: input.isActive,
        ownerUserId,
      });

      return { accountId: created.id, tenantId: tenant.id };
    });

    this.deps.logger.info({
      msg: 'accounts.create.success',
      flow: 'accounts.create',
      requestId: meta.requestId,
      tenantId: result.tenantId,
      accountId: result.accountId,
    });

    return { accountId: result.accountId };
  }

  async updateAccount(
    req: AccountRequest,
    accountId: string,
    input: AccountFormInput,
  ): Promise<void> {
    const now = new Date();
    const { actor, meta } = req;

    this.deps.logger.info({
      msg: 'accounts.update.start',
      flow: 'accounts.update',
      requestId: meta.requestId,
      tenantKey: meta.tenantKey,
      accountId,
    });

    await this.deps.db.transaction().execute(async (trx) => {
      await resolveActorTenant(trx, meta.tenantKey, actor);

      const account = await getVisibleAccount(trx, actor, accountId);
      assertAccountVisible(account, accountId);

      await this.deps.accountRepo.withDb(trx).updateAccount({
        accountId: account.id,
        name: input.name,
        isActive: input.isActive,
        actorUserId: actor.userId,
        now,
      });

      const changes: Record<string, { from: unknown; to: unknown }> = {};
      if (account.name !== input.name) changes.name = { from: account.name, to: input.name };
      if (account.isActive !== input.isActive) {
        changes.isActive = { from: account.isActive, to: input.isActive };
      }

      const audit = AuditWriter.forActor(this.deps.auditRepo.withDb(trx), actor, meta);
      await auditAccountUpdated(audit, { accountId: account.id, changes });
    });

    this.deps.logger.info({
      msg: 'accounts.update.success',
      flow: 'accounts.update',
      requestId: meta.requestId,
      tenantId: actor.tenantId,
      accountId,
    });
  }

  async deleteAccount(req: AccountRequest, accountId: string): Promise<void> {
    const { actor, meta } = req;

    this.deps.logger.info({
      msg: 'accounts.delete.start',
      flow: 'accounts.delete',
      requestId: meta.requestId,
      tenantKey: meta.tenantKey,
      accountId,
    });

    await this.deps.db.transaction().execute(async (trx) => {
      await resolveActorTenant(trx, meta.tenantKey, actor);

      const account = await getVisibleAccount(trx, actor, accountId);
      assertAccountVisible(account, accountId);

      await this.deps.accountRepo.withDb(trx).deleteAccount(account.id);

      const audit = AuditWriter.forActor(this.deps.auditRepo.withDb(trx), actor, meta);
      await auditAccountDeleted(audit, { accountId: account.id, name: account.name });
    });

    this.deps.logger.info({
      msg: 'accounts.delete.success',
      flow: 'accounts.delete',
      requestId: meta.requestId,
      tenantId: actor.tenantId,
      accountId,
    });
  }
}
