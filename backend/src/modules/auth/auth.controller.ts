/**
 * src/modules/auth/auth.controller.ts
 *
 * POST /auth/login  → 200 AuthResult + session cookie
 * POST /auth/logout → 204 + cleared cookie (with or without a live session)
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { parseBody } from '../../shared/http/parse-body';
import { requestMeta } from '../../shared/http/request-meta';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import { loginSchema } from './auth.schemas';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly isProduction: boolean,
  ) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const { email, password } = parseBody(loginSchema, req.body);
    const { result, sessionId } = await this.authService.login({
      email,
      password,
      meta: requestMeta(req),
    });

    setSessionCookie(reply, sessionId, this.isProduction);
    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    await this.authService.logout(req.authContext?.sessionId ?? null, requestMeta(req));

    clearSessionCookie(reply, this.isProduction);
    return reply.status(204).send();
  }
}
