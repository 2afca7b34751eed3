/**
 * src/shared/db/migrations/0003_auth_identities_audit.ts
 *
 * WHY:
 * - Password hashes live outside users (a user created as an account user
 *   may not have a password yet).
 * - audit_events is the append-only compliance trail.
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('auth_identities')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('provider', 'text', (col) => col.notNull())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE auth_identities
      ADD CONSTRAINT auth_identities_provider_check
      CHECK (provider IN ('password'));
  `.execute(db);

  // One identity per user per provider
  await sql`
    ALTER TABLE auth_identities
      ADD CONSTRAINT auth_identities_user_provider_unique
      UNIQUE (user_id, provider);
  `.execute(db);

  await db.schema
    .createTable('audit_events')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('tenant_id', 'uuid')
    .addColumn('user_id', 'uuid')
    .addColumn('membership_id', 'uuid')
    .addColumn('action', 'text', (col) => col.notNull())
    .addColumn('request_id', 'text')
    .addColumn('ip', 'text')
    .addColumn('user_agent', 'text')
    .addColumn('metadata', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE INDEX audit_events_tenant_id_idx ON audit_events(tenant_id);`.execute(db);
  await sql`CREATE INDEX audit_events_action_idx ON audit_events(action);`.execute(db);
  await sql`CREATE INDEX audit_events_created_at_idx ON audit_events(created_at);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('audit_events').ifExists().execute();
  await db.schema.dropTable('auth_identities').ifExists().execute();
}
