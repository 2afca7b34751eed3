/**
 * backend/src/modules/profile/profile.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the profile page.
 * - The form carries the page the user came from (Referer) and returns
 *   there after saving, when that page is on this site.
 *
 * RULES:
 * - No DB access here.
 * - Redirect targets pass through resolveRedirectTarget().
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireSession } from '../../shared/http/require-auth-context';
import { requestMeta } from '../../shared/http/request-meta';
import { parseBody } from '../../shared/http/parse-body';
import { resolveRedirectTarget, sendRedirect } from '../../shared/http/redirect';

import { profileUserFormSchema } from './profile.schemas';
import type { ProfileService } from './profile.service';

export class ProfileController {
  constructor(
    private readonly profileService: ProfileService,
    private readonly successUrl: string,
  ) {}

  async form(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireSession(req);
    const referrer = req.headers.referer ?? null;

    const page = await this.profileService.getProfileForm(
      { actor, meta: requestMeta(req) },
      referrer,
    );
    return reply.status(200).send(page);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const actor = requireSession(req);
    const meta = requestMeta(req);
    const input = parseBody(profileUserFormSchema, req.body);

    await this.profileService.updateProfile({ actor, meta }, input);

    return sendRedirect(reply, resolveRedirectTarget(input.referrer, meta.host, this.successUrl));
  }
}
