/**
 * backend/src/modules/account-users/account-user.errors.ts
 *
 * WHY:
 * - Account-users module owns its domain semantics.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AccountUserErrors = {
  accountUserNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Account user not found', meta);
  },

  emptyList(meta?: AppErrorMeta) {
    return AppError.notFound("Empty list and 'allowEmpty' is false.", meta);
  },

  alreadyMember(meta?: AppErrorMeta) {
    return AppError.conflict('User is already a member of this account.', meta);
  },

  emailInUse(meta?: AppErrorMeta) {
    return AppError.conflict('Email is already in use.', meta);
  },

  identityLocked(meta?: AppErrorMeta) {
    return AppError.forbidden("You cannot change this user's email or name.", meta);
  },

  passwordOnlyForNewUser(meta?: AppErrorMeta) {
    return AppError.validationError('A password can only be set for a new user.', meta);
  },
} as const;
