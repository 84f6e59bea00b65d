/**
 * src/shared/db/migrations/0002_credentials.ts
 *
 * WHY:
 * - One credential record per principal: password hash + salt, email verification,
 *   reset token, the current refresh token, and lockout counters.
 *
 * RULES:
 * - All tokens are stored as SHA-256 hashes, never raw.
 * - reset_token_hash and reset_token_expires_at are set together or cleared together.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('credentials')
    .addColumn('user_id', 'uuid', (col) =>
      col.primaryKey().references('users.id').onDelete('cascade'),
    )
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('password_salt', 'text', (col) => col.notNull())
    .addColumn('email_verified', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('email_verification_token_hash', 'text')
    .addColumn('reset_token_hash', 'text')
    .addColumn('reset_token_expires_at', 'timestamptz')
    .addColumn('refresh_token_hash', 'text')
    .addColumn('failed_login_attempts', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('locked_until', 'timestamptz')
    .addColumn('last_login_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint(
      'credentials_reset_token_paired',
      sql`(reset_token_hash IS NULL) = (reset_token_expires_at IS NULL)`,
    )
    .execute();

  await db.schema
    .createIndex('credentials_email_verification_token_hash_idx')
    .on('credentials')
    .column('email_verification_token_hash')
    .unique()
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('credentials').ifExists().execute();
}
