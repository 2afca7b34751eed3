/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Static migration registry: one list shared by the CLI migrator and the
 *   test harness, no filesystem scanning or dynamic TS imports.
 *
 * RULES:
 * - Append only. Keys sort lexically = execution order.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_tenants_memberships';
import * as m0003 from './0003_auth_identities_audit';
import * as m0004 from './0004_accounts';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_tenants_memberships': m0002,
  '0003_auth_identities_audit': m0003,
  '0004_accounts': m0004,
};
