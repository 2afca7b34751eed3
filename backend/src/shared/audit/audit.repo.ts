/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * Insert-only access to audit_events. Services go through AuditWriter; this
 * class only maps an event onto the row and makes the metadata JSON-safe.
 */

import type { DbExecutor } from '../db/db';
import type { JsonObject, JsonValue } from '../db/schema';
import type { AuditEventInsert, AuditMetadata } from './audit.types';

/**
 * Dates become ISO strings, non-finite numbers null; undefined, functions
 * and symbols are left out.
 */
function jsonSafe(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'object') return undefined;

  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item) => jsonSafe(item) ?? null);

  const out: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    const safe = jsonSafe(item);
    if (safe !== undefined) out[key] = safe;
  }
  return out;
}

function toMetadataColumn(metadata: AuditMetadata = {}): JsonValue {
  return jsonSafe(metadata) ?? {};
}

export class AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): AuditRepo {
    return new AuditRepo(db);
  }

  async append({ action, metadata, ...ctx }: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action,
        tenant_id: ctx.tenantId,
        user_id: ctx.userId,
        membership_id: ctx.membershipId,
        request_id: ctx.requestId,
        ip: ctx.ip,
        user_agent: ctx.userAgent,
        metadata: toMetadataColumn(metadata),
      })
      .execute();
  }
}
