/**
 * backend/src/modules/account-users/account-user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the account-user pages.
 * - GET pages answer view models; POST forms answer redirects.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (manager gating lives in the service).
 * - Malformed ids are "not found", like unknown ones.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireSession } from '../../shared/http/require-auth-context';
import { requestMeta } from '../../shared/http/request-meta';
import { parseBody } from '../../shared/http/parse-body';
import { sendRedirect } from '../../shared/http/redirect';
import { AccountErrors, accountUserListUrl, accountUserUrl } from '../accounts';

import {
  ACCOUNT_USER_ADD_FORM_INITIAL,
  accountUserAddFormSchema,
  accountUserFormSchema,
  accountUserListParamsSchema,
  accountUserParamsSchema,
} from './account-user.schemas';
import { AccountUserErrors } from './account-user.errors';
import type {
  AccountUserRef,
  AccountUserRequest,
  AccountUserService,
} from './account-user.service';

function accountIdFrom(req: FastifyRequest): string {
  const parsed = accountUserListParamsSchema.safeParse(req.params);
  if (!parsed.success) throw AccountErrors.accountNotFound();
  return parsed.data.accountId;
}

function accountUserRefFrom(req: FastifyRequest): AccountUserRef {
  const accountId = accountIdFrom(req);
  const parsed = accountUserParamsSchema.safeParse(req.params);
  if (!parsed.success) throw AccountUserErrors.accountUserNotFound();
  return { accountId, accountUserId: parsed.data.accountUserId };
}

function signedIn(req: FastifyRequest): AccountUserRequest {
  return { actor: requireSession(req), meta: requestMeta(req) };
}

export class AccountUserController {
  constructor(private readonly accountUserService: AccountUserService) {}

  async list(req: FastifyRequest, reply: FastifyReply) {
    const ctx = signedIn(req);
    const page = await this.accountUserService.listAccountUsers(ctx, accountIdFrom(req));
    return reply.status(200).send(page);
  }

  async detail(req: FastifyRequest, reply: FastifyReply) {
    const ctx = signedIn(req);
    const page = await this.accountUserService.getAccountUserDetail(ctx, accountUserRefFrom(req));
    return reply.status(200).send(page);
  }

  async addForm(req: FastifyRequest, reply: FastifyReply) {
    const ctx = signedIn(req);
    const account = await this.accountUserService.getManagedAccount(ctx, accountIdFrom(req));

    return reply.status(200).send({
      account,
      form: { initial: ACCOUNT_USER_ADD_FORM_INITIAL },
    });
  }

  async add(req: FastifyRequest, reply: FastifyReply) {
    const ctx = signedIn(req);
    const accountId = accountIdFrom(req);
    const input = parseBody(accountUserAddFormSchema, req.body);

    const { accountUserId } = await this.accountUserService.createAccountUser(
      ctx,
      accountId,
      input,
    );
    return sendRedirect(reply, accountUserUrl(accountId, accountUserId));
  }

  async editForm(req: FastifyRequest, reply: FastifyReply) {
    const ctx = signedIn(req);
    const { account, accountUser } = await this.accountUserService.getManagedAccountUser(
      ctx,
      accountUserRefFrom(req),
    );

    return reply.status(200).send({
      account,
      accountUser,
      form: {
        initial: {
          email: accountUser.user.email,
          firstName: accountUser.user.firstName,
          lastName: accountUser.user.lastName,
          isAdmin: accountUser.isAdmin,
        },
      },
    });
  }

  async edit(req: FastifyRequest, reply: FastifyReply) {
    const ctx = signedIn(req);
    const ref = accountUserRefFrom(req);
    const input = parseBody(accountUserFormSchema, req.body);

    await this.accountUserService.updateAccountUser(ctx, ref, input);
    return sendRedirect(reply, accountUserUrl(ref.accountId, ref.accountUserId));
  }

  async deleteConfirm(req: FastifyRequest, reply: FastifyReply) {
    const ctx = signedIn(req);
    const page = await this.accountUserService.getManagedAccountUser(ctx, accountUserRefFrom(req));
    return reply.status(200).send(page);
  }

  async delete(req: FastifyRequest, reply: FastifyReply) {
    const ctx = signedIn(req);
    const ref = accountUserRefFrom(req);

    await this.accountUserService.deleteAccountUser(ctx, ref);
    return sendRedirect(reply, accountUserListUrl(ref.accountId));
  }
}
