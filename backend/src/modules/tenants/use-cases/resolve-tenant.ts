/**
 * backend/src/modules/tenants/use-cases/resolve-tenant.ts
 *
 * The one way other modules turn a host key into a Tenant: key present,
 * row found, provider active. Pass `trx` when calling inside a transaction.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Tenant } from '../tenant.types';
import { getTenantByKey } from '../queries/tenant.queries';
import { assertTenantKeyPresent, assertTenantUsable } from '../policies/tenant-safety.policy';

export async function resolveTenant(db: DbExecutor, tenantKey: string | null): Promise<Tenant> {
  assertTenantKeyPresent(tenantKey);

  const tenant = await getTenantByKey(db, tenantKey);
  assertTenantUsable(tenant, tenantKey);
  return tenant;
}
