/**
 * src/modules/auth/dal/credential.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for credentials (mutations).
 * - One row per principal, keyed by user_id.
 *
 * RULES:
 * - No transactions started here (CredentialStore.transaction owns tx).
 * - No AppError. Driver errors become StoreError.
 * - No policies.
 * - withDb() rebinds the repo to a transaction (see CredentialStore.transaction).
 * - Only hashes are written; raw tokens never reach this file.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { StoreError, toStoreError } from '../../../shared/db/store-error';
import type { NewCredential } from '../auth.types';

export class CredentialRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): CredentialRepo {
    return new CredentialRepo(db);
  }

  private async run<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toStoreError(err, op);
    }
  }

  async insertCredential(params: NewCredential): Promise<void> {
    await this.run('credentials.insert', () =>
      this.db
        .insertInto('credentials')
        .values({
          user_id: params.userId,
          password_hash: params.passwordHash,
          password_salt: params.passwordSalt,
          email_verification_token_hash: params.emailVerificationTokenHash,
        })
        .execute(),
    );
  }

  async updatePasswordHash(params: {
    userId: string;
    passwordHash: string;
    passwordSalt: string;
  }): Promise<void> {
    await this.run('credentials.update_password', () =>
      this.db
        .updateTable('credentials')
        .set({
          password_hash: params.passwordHash,
          password_salt: params.passwordSalt,
          updated_at: new Date(),
        })
        .where('user_id', '=', params.userId)
        .execute(),
    );
  }

  /** Hash and expiry are written together (CHECK constraint). */
  async setResetToken(params: { userId: string; tokenHash: string; expiresAt: Date }): Promise<void> {
    await this.run('credentials.set_reset_token', () =>
      this.db
        .updateTable('credentials')
        .set({
          reset_token_hash: params.tokenHash,
          reset_token_expires_at: params.expiresAt,
          updated_at: new Date(),
        })
        .where('user_id', '=', params.userId)
        .execute(),
    );
  }

  async clearResetToken(params: { userId: string }): Promise<void> {
    await this.run('credentials.clear_reset_token', () =>
      this.db
        .updateTable('credentials')
        .set({ reset_token_hash: null, reset_token_expires_at: null, updated_at: new Date() })
        .where('user_id', '=', params.userId)
        .execute(),
    );
  }

  async markEmailVerified(params: { userId: string }): Promise<void> {
    await this.run('credentials.verify_email', () =>
      this.db
        .updateTable('credentials')
        .set({ email_verified: true, email_verification_token_hash: null, updated_at: new Date() })
        .where('user_id', '=', params.userId)
        .execute(),
    );
  }

  async updateLastLogin(params: { userId: string; at: Date }): Promise<void> {
    await this.run('credentials.update_last_login', () =>
      this.db
        .updateTable('credentials')
        .set({
          last_login_at: params.at,
          failed_login_attempts: 0,
          locked_until: null,
          updated_at: new Date(),
        })
        .where('user_id', '=', params.userId)
        .execute(),
    );
  }

  /**
   * Single UPDATE ... RETURNING, so concurrent failures each see their own count.
   */
  async incrementFailedAttempts(params: { userId: string }): Promise<number> {
    const row = await this.run('credentials.increment_failed_attempts', () =>
      this.db
        .updateTable('credentials')
        .set((eb) => ({
          failed_login_attempts: eb('failed_login_attempts', '+', 1),
          updated_at: new Date(),
        }))
        .where('user_id', '=', params.userId)
        .returning('failed_login_attempts')
        .executeTakeFirst(),
    );

    if (!row) throw new StoreError('unavailable', 'credentials.increment_failed_attempts');
    return row.failed_login_attempts;
  }

  async setLockout(params: { userId: string; lockedUntil: Date }): Promise<void> {
    await this.run('credentials.set_lockout', () =>
      this.db
        .updateTable('credentials')
        .set({ locked_until: params.lockedUntil, updated_at: new Date() })
        .where('user_id', '=', params.userId)
        .execute(),
    );
  }

  async clearLockout(params: { userId: string }): Promise<void> {
    await this.run('credentials.clear_lockout', () =>
      this.db
        .updateTable('credentials')
        .set({ failed_login_attempts: 0, locked_until: null, updated_at: new Date() })
        .where('user_id', '=', params.userId)
        .execute(),
    );
  }

  /** Pass null to revoke. */
  async setRefreshTokenHash(params: { userId: string; tokenHash: string | null }): Promise<void> {
    await this.run('credentials.set_refresh_token', () =>
      this.db
        .updateTable('credentials')
        .set({ refresh_token_hash: params.tokenHash, updated_at: new Date() })
        .where('user_id', '=', params.userId)
        .execute(),
    );
  }
}
