/**
 * backend/src/modules/accounts/policies/account-access.policy.ts
 *
 * WHY:
 * - Single-object access rule for account pages.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Visibility is decided by the scoped query; an account that did not come
 *   back is "not found" whatever the reason.
 */

import type { Account } from '../account.types';
import { AccountErrors } from '../account.errors';

export function assertAccountVisible(
  account: Account | undefined,
  accountId: string,
): asserts account is Account {
  if (!account) {
    throw AccountErrors.accountNotFound({ accountId });
  }
}
