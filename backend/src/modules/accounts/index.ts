/**
 * backend/src/modules/accounts/index.ts
 *
 * WHY:
 * - Public surface of the accounts module for account users.
 *
 * RULES:
 * - No service exports here: account-users imports this file and the
 *   accounts service imports account-users.
 */

export { getVisibleAccount, toAccountView } from './queries/account.queries';
export { assertAccountVisible } from './policies/account-access.policy';
export { AccountErrors } from './account.errors';
export { AccountRepo } from './dal/account.repo';
export { accountUrl, accountUserListUrl, accountUserUrl } from './account.urls';
export type { Account, AccountActor, AccountView } from './account.types';
