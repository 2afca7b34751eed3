/**
 * src/modules/auth/auth.errors.ts
 *
 * Login answers never say whether the email exists: unknown user, missing
 * password and wrong password all map to invalidCredentials.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  invalidCredentials: (meta?: AppErrorMeta) =>
    AppError.unauthorized('Invalid email or password.', meta),

  accountSuspended: (meta?: AppErrorMeta) =>
    AppError.forbidden('Your account has been suspended.', meta),

  /** Signed-up user, but not a member of the provider behind this host. */
  noAccess: (meta?: AppErrorMeta) =>
    AppError.forbidden("You don't have access to this provider.", meta),
} as const;
