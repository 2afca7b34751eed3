/**
 * backend/src/modules/profile/profile.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ProfileErrors = {
  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Username is already taken.', meta);
  },

  emailInUse(meta?: AppErrorMeta) {
    return AppError.conflict('Email is already in use.', meta);
  },

  /** The session points at a user that no longer exists. */
  userGone(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required', meta);
  },
} as const;
