/**
 * backend/src/modules/accounts/account.urls.ts
 *
 * Canonical page URLs for accounts and their account users.
 */

export const ACCOUNT_LIST_URL = '/accounts';

export function accountUrl(accountId: string): string {
  return `/accounts/${accountId}`;
}

export function accountUserListUrl(accountId: string): string {
  return `/accounts/${accountId}/people`;
}

export function accountUserUrl(accountId: string, accountUserId: string): string {
  return `/accounts/${accountId}/people/${accountUserId}`;
}
