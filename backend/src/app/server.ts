/**
 * backend/src/app/server.ts
 *
 * Fastify instance + global hooks, without routes and without listen().
 *
 * Hook order is load-bearing: requestContext (host → tenantKey) must exist
 * before the session middleware compares it with the session's tenantKey.
 */

import Fastify, { type FastifyInstance } from 'fastify';

import type { AppDeps } from './di';
import { withRequestContext } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(deps: Pick<AppDeps, 'sessionStore'>): Promise<FastifyInstance> {
  // Fastify's pino logger stays off; every line goes through winston.
  const app = Fastify({ logger: false });

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, deps.sessionStore);
  registerErrorHandler(app);

  app.addHook('onResponse', async (req, reply) => {
    withRequestContext(req).info('request', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  return app;
}
