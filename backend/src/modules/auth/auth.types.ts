/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Domain types for the Auth module.
 * - Credential holds everything secret about a principal (hashes, counters, tokens).
 * - Result types define what login/refresh/register return.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Never include raw passwords, hashes, or tokens in user-facing types.
 */

import type { User } from '../users';

/** Reset token hash and its expiry exist together or not at all. */
export type PendingResetToken = {
  tokenHash: string;
  expiresAt: Date;
};

export type Credential = {
  userId: string;
  passwordHash: string;
  passwordSalt: string;
  emailVerified: boolean;
  emailVerificationTokenHash: string | null;
  resetToken: PendingResetToken | null;
  /** Hash of the single live refresh token, null after logout/reset. */
  refreshTokenHash: string | null;
  failedLoginAttempts: number;
  /** null means "not locked", never "locked forever". */
  lockedUntil: Date | null;
  lastLoginAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type NewCredential = {
  userId: string;
  passwordHash: string;
  passwordSalt: string;
  emailVerificationTokenHash: string | null;
};

/** What the API is allowed to show about a principal. */
export type PublicUser = Pick<User, 'id' | 'username' | 'email' | 'isAdmin' | 'isPremium' | 'createdAt'>;

export type TokenPairResult = {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  user: PublicUser;
};

export type LoginResult = TokenPairResult & {
  sessionId: string;
};

export type OperationOptions = {
  signal?: AbortSignal;
};
