/**
 * backend/src/modules/tenants/policies/tenant-safety.policy.ts
 *
 * Pure checks on the provider (tenant) a request was addressed to.
 * A missing key is the caller's mistake (400); an unknown or disabled
 * provider is answered 404 / 403.
 */

import type { Tenant, TenantKey } from '../tenant.types';
import { TenantErrors } from '../tenant.errors';

export function assertTenantKeyPresent(
  tenantKey: TenantKey | null,
): asserts tenantKey is TenantKey {
  if (tenantKey === null || tenantKey === '') throw TenantErrors.tenantKeyMissing();
}

export function assertTenantUsable(
  tenant: Tenant | undefined,
  tenantKey: TenantKey,
): asserts tenant is Tenant {
  if (tenant === undefined) throw TenantErrors.tenantNotFound({ tenantKey });
  if (!tenant.isActive) {
    throw TenantErrors.tenantInactive({ tenantId: tenant.id, tenantKey: tenant.key });
  }
}
