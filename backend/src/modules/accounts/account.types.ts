/**
 * backend/src/modules/accounts/account.types.ts
 *
 * WHY:
 * - An Account is a client organisation owned by one provider (tenant).
 * - Account users hang off it (see modules/account-users).
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

import type { MembershipRole } from '../memberships/membership.types';

export type AccountId = string;

export type Account = {
  id: AccountId;
  tenantId: string;
  name: string;
  isActive: boolean;

  createdByUserId: string | null;
  updatedByUserId: string | null;

  createdAt: Date;
  updatedAt: Date;
};

/**
 * Account as rendered on pages: the domain fields plus its canonical URL.
 */
export type AccountView = Account & { url: string };

/**
 * The signed-in actor, as resolved by requireSession().
 */
export type AccountActor = Readonly<{
  userId: string;
  tenantId: string;
  membershipId: string;
  role: MembershipRole;
}>;
