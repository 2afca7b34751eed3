/**
 * backend/src/modules/tenants/dal/tenant.query-sql.ts
 *
 * DAL READS ONLY. Hosts resolve to a tenant on every request, so this is the
 * hottest read in the app; it selects just what the Tenant type carries.
 */

import type { DbExecutor } from '../../../shared/db/db';

const TENANT_COLUMNS = ['id', 'key', 'name', 'is_active', 'created_at', 'updated_at'] as const;

export function findTenantByKeySql(db: DbExecutor, tenantKey: string) {
  return db
    .selectFrom('tenants')
    .select(TENANT_COLUMNS)
    .where('key', '=', tenantKey)
    .executeTakeFirst();
}
