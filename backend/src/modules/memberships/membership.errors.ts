import { AppError, type AppErrorMeta } from '../../shared/http/errors';

// Raised when someone tries to attach a suspended member to an account; the
// suspension itself is lifted elsewhere, not by re-adding the user.
export const MembershipErrors = {
  membershipSuspended: (meta?: AppErrorMeta) =>
    AppError.forbidden('This user is suspended on this provider.', meta),
} as const;
