/**
 * backend/src/app/routes.ts
 *
 * GET /health plus every module's routes. Modules own their paths; nothing
 * here knows about accounts or profiles beyond "it has registerRoutes".
 */

import type { FastifyInstance } from 'fastify';
import type { AppConfig } from './config';
import type { AppDeps } from './di';

type RouteModule = { registerRoutes(app: FastifyInstance): void };

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  const { config, deps } = opts;

  // Answers on any host, tenant or not: platform probes hit the bare domain.
  app.get('/health', (req) => ({
    ok: true,
    env: config.nodeEnv,
    service: config.serviceName,
    requestId: req.requestContext.requestId,
    tenantKey: req.requestContext.tenantKey,
  }));

  const modules: RouteModule[] = [deps.auth, deps.accounts, deps.accountUsers, deps.profile];
  for (const feature of modules) feature.registerRoutes(app);
}
