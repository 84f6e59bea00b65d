/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: error messages never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /**
   * Login: unknown email, missing credential, or wrong password.
   * One message for all three so the response is not an oracle.
   */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  /** Bad, expired, revoked, or wrong-kind bearer/refresh token. */
  invalidToken(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid or expired token.', meta);
  },

  accountLocked(meta?: AppErrorMeta) {
    return AppError.forbidden('Account is temporarily locked. Please try again later.', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('This email is already registered. Please sign in.', meta);
  },

  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('This username is already taken.', meta);
  },

  /** Unique violation from the store; we don't know which field collided. */
  alreadyRegistered(meta?: AppErrorMeta) {
    return AppError.conflict('Email or username is already registered.', meta);
  },

  passwordsDoNotMatch(meta?: AppErrorMeta) {
    return AppError.validationError('Passwords do not match.', meta);
  },

  /** Message comes from the password policy and is safe to show. */
  passwordRejected(message: string, meta?: AppErrorMeta) {
    return AppError.validationError(message, meta);
  },

  /**
   * Reset token absent, mismatched, or expired.
   * A single error covers all conditions so nobody learns whether a token was ever issued.
   */
  resetTokenInvalid(meta?: AppErrorMeta) {
    return AppError.unauthorized(
      'This password reset link is invalid or has expired. Please request a new one.',
      meta,
    );
  },

  verificationTokenInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('This verification link is invalid or has already been used.', meta);
  },

  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  sessionNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Session not found.', meta);
  },

  registrationFailed(meta?: AppErrorMeta) {
    return AppError.internal('Registration failed. Please try again.', meta);
  },

  /** Store or signer is unhealthy. Details stay in meta (logged, never sent). */
  unavailable(meta?: AppErrorMeta) {
    return AppError.internal('Internal error', meta);
  },
} as const;
