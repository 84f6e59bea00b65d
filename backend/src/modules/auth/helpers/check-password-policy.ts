/**
 * src/modules/auth/helpers/check-password-policy.ts
 *
 * WHY:
 * - register() and resetPassword() reject weak passwords with the same 400.
 *
 * RULES:
 * - Policy errors become ValidationError; anything else is rethrown untouched.
 */

import {
  PasswordTooLongError,
  PasswordTooShortError,
  PasswordTooWeakError,
  validatePassword,
  type PasswordPolicy,
} from '../../../shared/security/password-policy';
import { AuthErrors } from '../auth.errors';

export function checkPasswordPolicy(password: string, policy: PasswordPolicy): void {
  try {
    validatePassword(password, policy);
  } catch (err) {
    if (
      err instanceof PasswordTooShortError ||
      err instanceof PasswordTooLongError ||
      err instanceof PasswordTooWeakError
    ) {
      throw AuthErrors.passwordRejected(err.message);
    }
    throw err;
  }
}
