/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations against DATABASE_URL from the command line.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import { createDb } from './db';
import { migrateToLatest } from './migrator';
import { buildConfig } from '../../app/config';
import { errorFields, logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  try {
    await migrateToLatest(db);
    logger.info('migrations.up_to_date');
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('migrations.failed', errorFields(err));
  process.exit(1);
});
