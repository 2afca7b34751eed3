/** Subdomain label that selects a provider, e.g. `acme` in acme.localhost. */
export type TenantKey = string;

/**
 * A provider organisation. Requests reach it only through its host key;
 * nothing in a request body or query can switch tenants.
 */
export type Tenant = {
  id: string;
  key: TenantKey;
  name: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};
