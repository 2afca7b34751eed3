/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One migrateToLatest() used by the CLI (migrate.ts) and the test harness.
 *
 * RULES:
 * - Throws on failure; callers decide whether to exit the process.
 */

import { Migrator } from 'kysely';

import type { Db } from './db';
import { migrations } from './migrations';
import { logger } from '../logger/logger';

export async function migrateToLatest(db: Db): Promise<void> {
  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: () => Promise.resolve(migrations),
    },
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }
}
