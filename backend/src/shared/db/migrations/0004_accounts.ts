/**
 * src/shared/db/migrations/0004_accounts.ts
 *
 * WHY:
 * - accounts are client organisations owned by a provider (tenant).
 * - account_users link a platform user to an account (+ account-level admin flag).
 *
 * RULES:
 * - Deleting an account removes its account_users (cascade); users survive.
 * - created_by/updated_by are informational and survive user deletion as NULL.
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('accounts')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('created_by_user_id', 'uuid', (col) =>
      col.references('users.id').onDelete('set null'),
    )
    .addColumn('updated_by_user_id', 'uuid', (col) =>
      col.references('users.id').onDelete('set null'),
    )
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE INDEX accounts_tenant_id_idx ON accounts(tenant_id);`.execute(db);

  await db.schema
    .createTable('account_users')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('account_id', 'uuid', (col) =>
      col.notNull().references('accounts.id').onDelete('cascade'),
    )
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('is_admin', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  // A user belongs to an account only once
  await sql`
    ALTER TABLE account_users
      ADD CONSTRAINT account_users_account_user_unique
      UNIQUE (account_id, user_id);
  `.execute(db);

  await sql`CREATE INDEX account_users_user_id_idx ON account_users(user_id);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('account_users').ifExists().execute();
  await db.schema.dropTable('accounts').ifExists().execute();
}
