/**
 * backend/src/modules/accounts/account.errors.ts
 *
 * WHY:
 * - Accounts module owns its domain semantics.
 *
 * SECURITY:
 * - An account of another provider and an account the actor may not see
 *   answer the same 404; existence is never revealed.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AccountErrors = {
  accountNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Account not found', meta);
  },

  cannotManageUsers(meta?: AppErrorMeta) {
    return AppError.forbidden('You cannot manage users of this account.', meta);
  },
} as const;
