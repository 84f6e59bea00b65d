/**
 * src/modules/auth/credential.store.ts
 *
 * WHY:
 * - The auth service is the only component that talks to credential persistence,
 *   and it does so through this contract (Kysely in prod, in-memory in tests).
 *
 * RULES:
 * - Token arguments are HASHES. Raw tokens never cross this boundary.
 * - A miss returns undefined; failures surface as StoreError.
 * - incrementFailedAttempts() returns the post-increment count (single atomic update).
 * - transaction() runs several writes all-or-nothing; the callback must only use the
 *   store it is handed.
 */

import type { Credential, NewCredential } from './auth.types';

export interface CredentialStore {
  createCredential(input: NewCredential): Promise<void>;
  getCredentialByPrincipalId(userId: string): Promise<Credential | undefined>;
  getByVerificationToken(tokenHash: string): Promise<Credential | undefined>;

  updatePasswordHash(userId: string, passwordHash: string, passwordSalt: string): Promise<void>;

  setResetToken(userId: string, tokenHash: string, expiresAt: Date): Promise<void>;
  clearResetToken(userId: string): Promise<void>;

  /** Marks the email verified and clears the verification token. */
  verifyEmail(userId: string): Promise<void>;

  /** Records the login time and resets failed attempts + lockout. */
  updateLastLogin(userId: string, at: Date): Promise<void>;
  incrementFailedAttempts(userId: string): Promise<number>;
  setLockout(userId: string, lockedUntil: Date): Promise<void>;
  /** Resets failed attempts and removes any lock. */
  clearLockout(userId: string): Promise<void>;

  storeRefreshToken(userId: string, tokenHash: string): Promise<void>;
  invalidateRefreshToken(userId: string): Promise<void>;

  transaction<T>(fn: (store: CredentialStore) => Promise<T>): Promise<T>;
}
