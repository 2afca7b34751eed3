/**
 * backend/src/modules/profile/profile.service.ts
 *
 * WHY:
 * - The signed-in user edits their own username, names, email and password.
 *
 * RULES:
 * - Acts on the session's user only; no id comes from the request.
 * - Username/email conflicts are checked with reads before writing.
 * - A password is stored only when one was entered.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RequestMeta } from '../../shared/http/request-meta';
import type { SessionActor } from '../../shared/http/require-auth-context';

import { resolveActorTenant } from '../_shared/use-cases/resolve-actor-tenant.usecase';
import { AuditWriter } from '../../shared/audit/audit.writer';
import { getUserByEmail, getUserById, getUserByUsername } from '../users';
import type { User, UserRepo } from '../users';
import { setPassword } from '../auth';
import type { AuthRepo } from '../auth';

import { ProfileErrors } from './profile.errors';
import { auditProfileUpdated } from './profile.audit';
import type { ProfileUserFormInput } from './profile.schemas';
import type { ProfilePage } from './profile.types';

export type ProfileRequest = Readonly<{
  actor: SessionActor;
  meta: RequestMeta;
}>;

export class ProfileService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      auditRepo: AuditRepo;
      passwordHasher: PasswordHasher;
      userRepo: UserRepo;
      authRepo: AuthRepo;
    },
  ) {}

  async getProfileForm(req: ProfileRequest, referrer: string | null): Promise<ProfilePage> {
    await resolveActorTenant(this.deps.db, req.meta.tenantKey, req.actor);
    const user = await this.loadUser(this.deps.db, req.actor.userId);

    return {
      profile: true,
      form: {
        initial: {
          username: user.username,
          firstName: user.firstName,
          lastName: user.lastName,
          email: user.email,
          referrer,
        },
      },
    };
  }

  async updateProfile(req: ProfileRequest, input: ProfileUserFormInput): Promise<void> {
    const { actor, meta } = req;
    const email = input.email.toLowerCase();
    const passwordChanged = input.password1.length > 0;

    this.deps.logger.info({
      msg: 'profile.update.start',
      flow: 'profile.update',
      requestId: meta.requestId,
      tenantKey: meta.tenantKey,
      userId: actor.userId,
    });

    await this.deps.db.transaction().execute(async (trx) => {
      await resolveActorTenant(trx, meta.tenantKey, actor);
      const user = await this.loadUser(trx, actor.userId);

      const usernameOwner = await getUserByUsername(trx, input.username);
      if (usernameOwner && usernameOwner.id !== user.id) {
        throw ProfileErrors.usernameTaken({ userId: user.id });
      }

      const emailOwner = await getUserByEmail(trx, email);
      if (emailOwner && emailOwner.id !== user.id) {
        throw ProfileErrors.emailInUse({ userId: user.id });
      }

      await this.deps.userRepo.withDb(trx).updateUser(user.id, {
        username: input.username,
        firstName: input.firstName,
        lastName: input.lastName,
        email,
      });

      if (passwordChanged) {
        await setPassword({
          authRepo: this.deps.authRepo.withDb(trx),
          passwordHasher: this.deps.passwordHasher,
          userId: user.id,
          rawPassword: input.password1,
        });
      }

      const changedFields: string[] = [];
      if (user.username !== input.username) changedFields.push('username');
      if (user.firstName !== input.firstName) changedFields.push('firstName');
      if (user.lastName !== input.lastName) changedFields.push('lastName');
      if (user.email !== email) changedFields.push('email');

      const audit = AuditWriter.forActor(this.deps.auditRepo.withDb(trx), actor, meta);
      await auditProfileUpdated(audit, { userId: user.id, changedFields, passwordChanged });
    });

    this.deps.logger.info({
      msg: 'profile.update.success',
      flow: 'profile.update',
      requestId: meta.requestId,
      tenantId: actor.tenantId,
      userId: actor.userId,
      passwordChanged,
    });
  }

  private async loadUser(db: DbExecutor, userId: string): Promise<User> {
    const user = await getUserById(db, userId);
    if (!user) throw ProfileErrors.userGone({ userId });
    return user;
  }
}
