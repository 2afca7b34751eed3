/**
 * backend/src/modules/tenants/tenant.errors.ts
 *
 * A tenant is the provider that owns a host (`<key>.localhost`). Errors here are
 * worded for the provider so they read sensibly on any page.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const TenantErrors = {
  /** 400: bare host, no subdomain to resolve. */
  tenantKeyMissing: (meta?: AppErrorMeta) =>
    AppError.validationError('Provider key is missing from request host.', meta),

  tenantNotFound: (meta?: AppErrorMeta) => AppError.notFound('Provider not found', meta),

  tenantInactive: (meta?: AppErrorMeta) => AppError.forbidden('Provider is inactive', meta),
} as const;
