/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - config → deps → server → routes (→ dev seed), in one call.
 *   index.ts listens on the result; tests drive it with app.inject().
 */

import type { AppConfig } from './config';
import { buildDeps, type AppDeps, type AppInfra } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

async function seedIfEnabled(config: AppConfig, deps: AppDeps): Promise<void> {
  const { seed } = config;
  if (!seed.enabled) return;

  const flow = 'seed.dev';
  if (config.nodeEnv === 'production') {
    logger.warn('seed.skipped_in_production', { flow });
    return;
  }

  logger.info('seed.start', { flow, tenantKey: seed.tenantKey });
  await runDevSeed({
    db: deps.db,
    ...deps.repos,
    passwordHasher: deps.passwordHasher,
    options: {
      tenantKey: seed.tenantKey,
      tenantName: seed.tenantName,
      adminEmail: seed.adminEmail,
      adminPassword: seed.adminPassword,
    },
  });
  logger.info('seed.done', { flow, tenantKey: seed.tenantKey });
}

export async function buildApp(config: AppConfig, infra?: AppInfra) {
  logger.level = config.logLevel;

  const deps = await buildDeps(config, infra);
  const app = await buildServer(deps);
  registerRoutes(app, { config, deps });

  await seedIfEnabled(config, deps);

  return {
    app,
    deps,
    close: async () => {
      await app.close();
      await deps.close();
    },
  };
}
