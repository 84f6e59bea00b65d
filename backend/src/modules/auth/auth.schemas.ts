/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Password strength is NOT checked here; the service applies the configured policy
 *   so HTTP and non-HTTP callers get the same rules and messages.
 * - Email normalized to lowercase in service, not here.
 * - Token min-length guards against obviously garbage values but does not
 *   validate the token cryptographically (that is the service's job).
 */

import { z } from 'zod';

const password = z.string().min(1, 'Password is required').max(256, 'Password is too long');

export const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(32, 'Username must be at most 32 characters')
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, _ . -'),
  email: z.string().email('Invalid email address'),
  password,
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password,
});

export type LoginInput = z.infer<typeof loginSchema>;

export const refreshSchema = z.object({
  refreshToken: z.string().min(1, 'Refresh token is required'),
});

export const forgotPasswordSchema = z.object({
  email: z.string().email('Invalid email address'),
});

export type ForgotPasswordInput = z.infer<typeof forgotPasswordSchema>;

export const resetPasswordSchema = z.object({
  /**
   * Raw reset token from the email link.
   * min(20) guards against obviously empty/garbage values.
   */
  token: z.string().min(20, 'Invalid reset token'),
  email: z.string().email('Invalid email address'),
  newPassword: password,
  confirmPassword: password,
});

export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>;

export const verifyEmailSchema = z.object({
  token: z.string().min(20, 'Invalid verification token'),
});

export const sessionRefreshSchema = z.object({
  sessionId: z.string().regex(/^[0-9a-f]{64}$/, 'Invalid session id'),
});
