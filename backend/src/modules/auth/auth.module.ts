/**
 * src/modules/auth/auth.module.ts
 *
 * Wires login/logout. AuthRepo is built by the composition root with the other
 * repos (account users and profile write passwords through it too).
 */

import type { FastifyInstance } from 'fastify';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import type { LoginDeps } from './flows/login/execute-login-flow';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: LoginDeps & { isProduction: boolean }) {
  const { isProduction, ...serviceDeps } = deps;
  const authService = new AuthService(serviceDeps);
  const controller = new AuthController(authService, isProduction);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
