/**
 * backend/src/shared/db/db.ts
 *
 * Kysely over a pg pool. Only app/di.ts calls createDb; tests hand a
 * PGlite-backed Kysely<DB> to buildApp instead. Table types: ./schema.ts.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * What DAL and query functions accept: the root Db or a transaction.
 * Services pass `trx` inside `db.transaction().execute(...)`.
 */
export type DbExecutor = Kysely<DB>;

const POOL_DEFAULTS = {
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 10_000,
} satisfies pg.PoolConfig;

export function createDb(connectionString: string): Db {
  const pool = new pg.Pool({ ...POOL_DEFAULTS, connectionString });
  return new Kysely<DB>({ dialect: new PostgresDialect({ pool }) });
}
