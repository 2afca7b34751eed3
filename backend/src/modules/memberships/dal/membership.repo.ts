/**
 * backend/src/modules/memberships/dal/membership.repo.ts
 *
 * DAL WRITES ONLY for memberships. Bound to the caller's transaction via
 * withDb(trx); the (tenant_id, user_id) unique index rejects duplicates.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Membership, MembershipRole, MembershipStatus } from '../membership.types';
import { toMembership } from '../queries/membership.queries';

export type NewMembership = {
  tenantId: string;
  userId: string;
  role: MembershipRole;
  /** Defaults to ACTIVE. */
  status?: MembershipStatus;
};

export class MembershipRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): MembershipRepo {
    return new MembershipRepo(db);
  }

  async insertMembership(input: NewMembership): Promise<Membership> {
    const row = await this.db
      .insertInto('memberships')
      .values({
        tenant_id: input.tenantId,
        user_id: input.userId,
        role: input.role,
        status: input.status ?? 'ACTIVE',
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toMembership(row);
  }
}
