// Public surface of tenants: other modules resolve a tenant from the host key,
// nothing more. The repo is exported for the composition root and the seed.

export { resolveTenant } from './use-cases/resolve-tenant';
export { TenantRepo } from './dal/tenant.repo';
export type { Tenant } from './tenant.types';
