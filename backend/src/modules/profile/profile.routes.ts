/**
 * backend/src/modules/profile/profile.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { ProfileController } from './profile.controller';

export function registerProfileRoutes(app: FastifyInstance, controller: ProfileController) {
  app.get('/profile', controller.form.bind(controller));
  app.post('/profile', controller.update.bind(controller));
}
