/**
 * backend/src/modules/tenants/dal/tenant.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for tenants (mutations).
 * - Providers are created by the dev seed (no HTTP surface yet).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class TenantRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): TenantRepo {
    return new TenantRepo(db);
  }

  /**
   * Inserts the tenant unless the key already exists. Returns the tenant id either way.
   */
  async ensureTenant(params: { key: string; name: string }): Promise<{ id: string }> {
    await this.db
      .insertInto('tenants')
      .values({ key: params.key, name: params.name, is_active: true })
      .onConflict((oc) => oc.column('key').doNothing())
      .execute();

    return this.db
      .selectFrom('tenants')
      .select(['id'])
      .where('key', '=', params.key)
      .executeTakeFirstOrThrow();
  }
}
