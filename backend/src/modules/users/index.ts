/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Users are global (not tenant-scoped); login, profile and account user
 *   provisioning all read them through this surface.
 *
 * RULES:
 * - Reads are queries; writes go through UserRepo inside the caller's transaction.
 */

export {
  getUserByEmail,
  getUserById,
  getUserByUsername,
  pickAvailableUsername,
} from './queries/user.queries';
export { UserRepo } from './dal/user.repo';
export { USERNAME_MAX_LENGTH, USERNAME_PATTERN } from './user.constants';
export type { User, UserSummary } from './user.types';
