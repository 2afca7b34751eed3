/**
 * backend/src/modules/tenants/queries/tenant.queries.ts
 *
 * Read side of tenants: row → Tenant. No errors thrown here; the
 * policy decides what a missing or inactive tenant means.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Tenant, TenantKey } from '../tenant.types';
import { findTenantByKeySql } from '../dal/tenant.query-sql';

type TenantRecord = NonNullable<Awaited<ReturnType<typeof findTenantByKeySql>>>;

const toTenant = (row: TenantRecord): Tenant => ({
  id: row.id,
  key: row.key,
  name: row.name,
  isActive: row.is_active,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export async function getTenantByKey(
  db: DbExecutor,
  tenantKey: TenantKey,
): Promise<Tenant | undefined> {
  const row = await findTenantByKeySql(db, tenantKey);
  return row ? toTenant(row) : undefined;
}
