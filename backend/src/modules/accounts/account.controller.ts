/**
 * backend/src/modules/accounts/account.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the account pages.
 * - GET pages answer view models; POST forms answer redirects.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Create/update/delete are PROVIDER only (checked before anything else).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireSession } from '../../shared/http/require-auth-context';
import { requestMeta } from '../../shared/http/request-meta';
import { parseBody } from '../../shared/http/parse-body';
import { sendRedirect } from '../../shared/http/redirect';

import {
  ACCOUNT_ADD_FORM_INITIAL,
  accountAddFormSchema,
  accountFormSchema,
  accountParamsSchema,
} from './account.schemas';
import { AccountErrors } from './account.errors';
import { ACCOUNT_LIST_URL, accountUrl } from './account.urls';
import type { AccountRequest, AccountService } from './account.service';

function accountIdFrom(req: FastifyRequest): string {
  const parsed = accountParamsSchema.safeParse(req.params);
  if (!parsed.success) throw AccountErrors.accountNotFound();
  return parsed.data.accountId;
}

function providerRequest(req: FastifyRequest): AccountRequest {
  return { actor: requireSession(req, { role: 'PROVIDER' }), meta: requestMeta(req) };
}

function memberRequest(req: FastifyRequest): AccountRequest {
  return { actor: requireSession(req), meta: requestMeta(req) };
}

export class AccountController {
  constructor(private readonly accountService: AccountService) {}

  async list(req: FastifyRequest, reply: FastifyReply) {
    const accounts = await this.accountService.listAccounts(memberRequest(req));
    return reply.status(200).send({ accounts });
  }

  async detail(req: FastifyRequest, reply: FastifyReply) {
    const ctx = memberRequest(req);
    const detail = await this.accountService.getAccountDetail(ctx, accountIdFrom(req));
    return reply.status(200).send(detail);
  }

  async addForm(req: FastifyRequest, reply: FastifyReply) {
    providerRequest(req);
    return reply.status(200).send({ form: { initial: ACCOUNT_ADD_FORM_INITIAL } });
  }

  async add(req: FastifyRequest, reply: FastifyReply) {
    const ctx = providerRequest(req);
    const input = parseBody(accountAddFormSchema, req.body);

    const { accountId } = await this.accountService.createAccount(ctx, input);
    return sendRedirect(reply, accountUrl(accountId));
  }

  async editForm(req: FastifyRequest, reply: FastifyReply) {
    const ctx = providerRequest(req);
    const account = await this.accountService.getAccount(ctx, accountIdFrom(req));

    return reply.status(200).send({
      account,
      form: { initial: { name: account.name, isActive: account.isActive } },
    });
  }

  async edit(req: FastifyRequest, reply: FastifyReply) {
    const ctx = providerRequest(req);
    const accountId = accountIdFrom(req);
    const input = parseBody(accountFormSchema, req.body);

    await this.accountService.updateAccount(ctx, accountId, input);
    return sendRedirect(reply, accountUrl(accountId));
  }

  async deleteConfirm(req: FastifyRequest, reply: FastifyReply) {
    const ctx = providerRequest(req);
    const account = await this.accountService.getAccount(ctx, accountIdFrom(req));
    return reply.status(200).send({ account });
  }

  async delete(req: FastifyRequest, reply: FastifyReply) {
    const ctx = providerRequest(req);
    await this.accountService.deleteAccount(ctx, accountIdFrom(req));
    return sendRedirect(reply, ACCOUNT_LIST_URL);
  }
}
