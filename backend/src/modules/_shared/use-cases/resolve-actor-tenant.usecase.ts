/**
 * src/modules/_shared/use-cases/resolve-actor-tenant.usecase.ts
 *
 * WHY:
 * - Every signed-in page starts with the same two checks: the request host
 *   names a usable provider, and the session belongs to that provider.
 *
 * RULES:
 * - Tenant failures throw TenantErrors (400 / 404 / 403).
 * - A session issued for another provider is treated as no session (401).
 */

import type { DbExecutor } from '../../../shared/db/db';
import { AppError } from '../../../shared/http/errors';
import { resolveTenant } from '../../tenants';
import type { Tenant } from '../../tenants';

export async function resolveActorTenant(
  db: DbExecutor,
  tenantKey: string | null,
  actor: { tenantId: string },
): Promise<Tenant> {
  const tenant = await resolveTenant(db, tenantKey);

  if (tenant.id !== actor.tenantId) {
    throw AppError.unauthorized('Authentication required', { tenantId: tenant.id });
  }

  return tenant;
}
