/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely table types for the whole database.
 * - Mirrors the migrations in ./migrations (keep both in lockstep).
 *
 * RULES:
 * - snake_case here only; queries map rows to camelCase domain types.
 * - Columns with a DB default are Generated<> so inserts may omit them.
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type JsonPrimitive = boolean | number | string | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue | undefined };
export type JsonValue = JsonArray | JsonObject | JsonPrimitive;

export interface Users {
  id: Generated<string>;
  email: string;
  username: string;
  first_name: Generated<string>;
  last_name: Generated<string>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface Tenants {
  id: Generated<string>;
  key: string;
  name: string;
  is_active: Generated<boolean>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface Memberships {
  id: Generated<string>;
  tenant_id: string;
  user_id: string;
  role: string;
  status: string;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface AuthIdentities {
  id: Generated<string>;
  user_id: string;
  provider: string;
  password_hash: string;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface Accounts {
  id: Generated<string>;
  tenant_id: string;
  name: string;
  is_active: Generated<boolean>;
  created_by_user_id: string | null;
  updated_by_user_id: string | null;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface AccountUsers {
  id: Generated<string>;
  account_id: string;
  user_id: string;
  is_admin: Generated<boolean>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface AuditEvents {
  id: Generated<string>;
  tenant_id: string | null;
  user_id: string | null;
  membership_id: string | null;
  action: string;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: ColumnType<JsonValue, JsonValue | undefined, JsonValue>;
  created_at: GeneratedTimestamp;
}

export interface DB {
  users: Users;
  tenants: Tenants;
  memberships: Memberships;
  auth_identities: AuthIdentities;
  accounts: Accounts;
  account_users: AccountUsers;
  audit_events: AuditEvents;
}
