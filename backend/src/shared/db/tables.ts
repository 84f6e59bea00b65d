/**
 * backend/src/shared/db/tables.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - Two tables only, so the interface is kept by hand next to the migrations.
 *
 * RULES:
 * - Every migration that changes a column changes this file in the same commit.
 * - Column names are snake_case (Postgres); mapping to camelCase happens in the DAL.
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface UsersTable {
  id: Generated<string>;
  username: string;
  email: string;
  is_admin: Generated<boolean>;
  is_premium: Generated<boolean>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface CredentialsTable {
  user_id: string;
  password_hash: string;
  password_salt: string;
  email_verified: Generated<boolean>;
  email_verification_token_hash: string | null;
  reset_token_hash: string | null;
  reset_token_expires_at: Timestamp | null;
  refresh_token_hash: string | null;
  failed_login_attempts: Generated<number>;
  locked_until: Timestamp | null;
  last_login_at: Timestamp | null;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface DB {
  users: UsersTable;
  credentials: CredentialsTable;
}
