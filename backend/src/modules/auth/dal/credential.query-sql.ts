/**
 * src/modules/auth/dal/credential.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for credentials (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CredentialsTable } from '../../../shared/db/tables';

export type CredentialRow = Selectable<CredentialsTable>;

export async function selectCredentialByUserIdSql(
  db: DbExecutor,
  userId: string,
): Promise<CredentialRow | undefined> {
  return db.selectFrom('credentials').selectAll().where('user_id', '=', userId).executeTakeFirst();
}

export async function selectCredentialByVerificationTokenHashSql(
  db: DbExecutor,
  tokenHash: string,
): Promise<CredentialRow | undefined> {
  return db
    .selectFrom('credentials')
    .selectAll()
    .where('email_verification_token_hash', '=', tokenHash)
    .executeTakeFirst();
}
