import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

// Both endpoints are reachable without a session; logout just has nothing to do then.
export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/auth/login', controller.login.bind(controller));
  app.post('/auth/logout', controller.logout.bind(controller));
}
