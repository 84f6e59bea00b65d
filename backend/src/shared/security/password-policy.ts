/**
 * backend/src/shared/security/password-policy.ts
 *
 * WHY:
 * - One place that decides whether a new password is acceptable (register + reset).
 * - Each character-class rule can be toggled independently from config.
 *
 * HOW TO USE:
 * - validatePassword(pw, policy)   // throws PasswordTooShortError | PasswordTooLongError | PasswordTooWeakError
 * - passwordStrength(pw)           // 0..6, advisory only (UI meters); never gates anything
 *
 * RULES:
 * - bcrypt reads at most 72 bytes, and the hasher appends a 24-char salt, so the
 *   password itself is capped at 48 UTF-8 bytes. Longer input is refused, never truncated.
 */

export type PasswordPolicy = Readonly<{
  minLength: number;
  requireUppercase: boolean;
  requireLowercase: boolean;
  requireDigit: boolean;
  requireSpecial: boolean;
}>;

export const DEFAULT_PASSWORD_POLICY: PasswordPolicy = {
  minLength: 8,
  requireUppercase: true,
  requireLowercase: true,
  requireDigit: true,
  requireSpecial: true,
};

export class PasswordTooShortError extends Error {
  constructor(readonly minLength: number) {
    super(`Password must be at least ${minLength} characters`);
    this.name = 'PasswordTooShortError';
  }
}

/** bcrypt input limit minus the base64 salt appended by BcryptPasswordHasher. */
export const MAX_PASSWORD_BYTES = 48;

export class PasswordTooLongError extends Error {
  constructor(readonly maxBytes: number = MAX_PASSWORD_BYTES) {
    super(`Password must be at most ${maxBytes} bytes`);
    this.name = 'PasswordTooLongError';
  }
}

export class PasswordTooWeakError extends Error {
  constructor() {
    super(
      'Password must contain at least one uppercase letter, one lowercase letter, one digit, and one special character',
    );
    this.name = 'PasswordTooWeakError';
  }
}

const UPPERCASE = /[A-Z]/;
const LOWERCASE = /[a-z]/;
const DIGIT = /[0-9]/;
const SPECIAL = /[^a-zA-Z0-9]/;

export function validatePassword(
  password: string,
  policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY,
): void {
  if (password.length < policy.minLength) {
    throw new PasswordTooShortError(policy.minLength);
  }
  if (Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES) {
    throw new PasswordTooLongError();
  }

  if (policy.requireUppercase && !UPPERCASE.test(password)) throw new PasswordTooWeakError();
  if (policy.requireLowercase && !LOWERCASE.test(password)) throw new PasswordTooWeakError();
  if (policy.requireDigit && !DIGIT.test(password)) throw new PasswordTooWeakError();
  if (policy.requireSpecial && !SPECIAL.test(password)) throw new PasswordTooWeakError();
}

export function passwordStrength(password: string): number {
  if (password.length < 8) return 0;

  let score = 1;
  if (password.length >= 12) score++;
  if (UPPERCASE.test(password)) score++;
  if (LOWERCASE.test(password)) score++;
  if (DIGIT.test(password)) score++;
  if (SPECIAL.test(password)) score++;

  return score;
}
