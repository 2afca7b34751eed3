/**
 * backend/src/modules/account-users/account-user.types.ts
 *
 * WHY:
 * - An AccountUser links a global User to one Account.
 * - isAdmin lets a CLIENT member manage the other users of that account.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

import type { UserSummary } from '../users/user.types';

export type AccountUserId = string;

export type AccountUser = {
  id: AccountUserId;
  accountId: string;
  userId: string;
  isAdmin: boolean;

  user: UserSummary;

  createdAt: Date;
  updatedAt: Date;
};

export type AccountUserView = AccountUser & { url: string };
