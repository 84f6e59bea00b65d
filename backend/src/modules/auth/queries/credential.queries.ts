/**
 * src/modules/auth/queries/credential.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into the Credential domain type.
 *
 * RULES:
 * - Read-only.
 * - No AppError. Driver errors become StoreError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { toStoreError } from '../../../shared/db/store-error';
import {
  selectCredentialByUserIdSql,
  selectCredentialByVerificationTokenHashSql,
  type CredentialRow,
} from '../dal/credential.query-sql';
import type { Credential } from '../auth.types';

export function toCredential(row: CredentialRow): Credential {
  return {
    userId: row.user_id,
    passwordHash: row.password_hash,
    passwordSalt: row.password_salt,
    emailVerified: row.email_verified,
    emailVerificationTokenHash: row.email_verification_token_hash,
    resetToken:
      row.reset_token_hash !== null && row.reset_token_expires_at !== null
        ? { tokenHash: row.reset_token_hash, expiresAt: row.reset_token_expires_at }
        : null,
    refreshTokenHash: row.refresh_token_hash,
    failedLoginAttempts: row.failed_login_attempts,
    lockedUntil: row.locked_until,
    lastLoginAt: row.last_login_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

async function read(
  op: string,
  run: () => Promise<CredentialRow | undefined>,
): Promise<Credential | undefined> {
  let row: CredentialRow | undefined;
  try {
    row = await run();
  } catch (err) {
    throw toStoreError(err, op);
  }
  return row ? toCredential(row) : undefined;
}

export function getCredentialByUserId(db: DbExecutor, userId: string): Promise<Credential | undefined> {
  return read('credentials.by_user_id', () => selectCredentialByUserIdSql(db, userId));
}

export function getCredentialByVerificationTokenHash(
  db: DbExecutor,
  tokenHash: string,
): Promise<Credential | undefined> {
  return read('credentials.by_verification_token', () =>
    selectCredentialByVerificationTokenHashSql(db, tokenHash),
  );
}
