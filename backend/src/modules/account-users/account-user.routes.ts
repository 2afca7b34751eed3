/**
 * backend/src/modules/account-users/account-user.routes.ts
 *
 * WHY:
 * - Declares Account-users module endpoints (nested under one account).
 *
 * RULES:
 * - No business logic here.
 * - /people/add is a static segment; Fastify matches it before :accountUserId.
 */

import type { FastifyInstance } from 'fastify';
import type { AccountUserController } from './account-user.controller';

export function registerAccountUserRoutes(
  app: FastifyInstance,
  controller: AccountUserController,
) {
  const base = '/accounts/:accountId/people';

  app.get(base, controller.list.bind(controller));

  app.get(`${base}/add`, controller.addForm.bind(controller));
  app.post(`${base}/add`, controller.add.bind(controller));

  app.get(`${base}/:accountUserId`, controller.detail.bind(controller));

  app.get(`${base}/:accountUserId/edit`, controller.editForm.bind(controller));
  app.post(`${base}/:accountUserId/edit`, controller.edit.bind(controller));

  app.get(`${base}/:accountUserId/delete`, controller.deleteConfirm.bind(controller));
  app.post(`${base}/:accountUserId/delete`, controller.delete.bind(controller));
}
