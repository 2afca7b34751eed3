/**
 * backend/src/modules/account-users/index.ts
 *
 * WHY:
 * - Public surface of the account-users module for accounts
 *   (detail page lists the users, create provisions the first owner).
 *
 * RULES:
 * - No service exports here (see modules/accounts/index.ts).
 */

export { listAccountUsers, toAccountUserView } from './queries/account-user.queries';
export { auditAccountUserCreated } from './account-user.audit';
export { AccountUserRepo } from './dal/account-user.repo';
export type { AccountUser, AccountUserView } from './account-user.types';
