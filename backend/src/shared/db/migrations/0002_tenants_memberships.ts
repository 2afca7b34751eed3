/**
 * src/shared/db/migrations/0002_tenants_memberships.ts
 *
 * WHY:
 * - tenants = providers, resolved by subdomain key.
 * - memberships decide who may sign in to a provider and with which role:
 *   PROVIDER staff manage accounts, CLIENT members are account users.
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('tenants')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('key', 'text', (col) => col.notNull().unique())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('memberships')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('role', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE memberships
      ADD CONSTRAINT memberships_role_check
      CHECK (role IN ('PROVIDER','CLIENT'));
  `.execute(db);

  await sql`
    ALTER TABLE memberships
      ADD CONSTRAINT memberships_status_check
      CHECK (status IN ('ACTIVE','SUSPENDED'));
  `.execute(db);

  // A user can belong to a tenant only once
  await sql`
    ALTER TABLE memberships
      ADD CONSTRAINT memberships_tenant_user_unique
      UNIQUE (tenant_id, user_id);
  `.execute(db);

  await sql`CREATE INDEX memberships_user_id_idx ON memberships(user_id);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('memberships').ifExists().execute();
  await db.schema.dropTable('tenants').ifExists().execute();
}
