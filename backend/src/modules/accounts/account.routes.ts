/**
 * backend/src/modules/accounts/account.routes.ts
 *
 * WHY:
 * - Declares Accounts module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - /accounts/add is a static segment; Fastify matches it before :accountId.
 */

import type { FastifyInstance } from 'fastify';
import type { AccountController } from './account.controller';

export function registerAccountRoutes(app: FastifyInstance, controller: AccountController) {
  app.get('/accounts', controller.list.bind(controller));

  app.get('/accounts/add', controller.addForm.bind(controller));
  app.post('/accounts/add', controller.add.bind(controller));

  app.get('/accounts/:accountId', controller.detail.bind(controller));

  app.get('/accounts/:accountId/edit', controller.editForm.bind(controller));
  app.post('/accounts/:accountId/edit', controller.edit.bind(controller));

  app.get('/accounts/:accountId/delete', controller.deleteConfirm.bind(controller));
  app.post('/accounts/:accountId/delete', controller.delete.bind(controller));
}
