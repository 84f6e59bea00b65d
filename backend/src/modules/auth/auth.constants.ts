/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 * - Tunables that operators change live in AppConfig, not here.
 */

/** 48 bytes -> 64 URL-safe chars. */
export const RESET_TOKEN_BYTES = 48;

/** 32 bytes -> 43 URL-safe chars. */
export const VERIFICATION_TOKEN_BYTES = 32;

export const NOTIFICATION_SUBJECTS = {
  verifyEmail: 'Verify your email address',
  resetPassword: 'Reset your password',
  passwordChanged: 'Your password was changed',
  accountLocked: 'Your account has been locked',
} as const;
