/**
 * backend/src/modules/auth/index.ts
 *
 * WHY:
 * - Public surface of the auth module for account users and profile.
 */

export { AuthRepo } from './dal/auth.repo';
export { setPassword } from './helpers/set-password';
export { getPasswordHash } from './queries/auth.queries';
