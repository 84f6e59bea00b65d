/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const { hash, salt } = await hasher.hash(password)   // persist BOTH
 * - await hasher.verify(password, hash, salt)            // throws on failure
 *
 * ERRORS:
 * - PasswordMismatchError: the password is wrong (expected, user-caused).
 * - PasswordVerificationError: the stored hash is unusable (data problem, not the user's fault).
 *   Callers must not treat the two the same way.
 */

export type HashedPassword = {
  hash: string;
  salt: string;
};

export interface PasswordHasher {
  hash(plain: string): Promise<HashedPassword>;
  verify(plain: string, hash: string, salt: string): Promise<void>;
}

export class PasswordMismatchError extends Error {
  constructor() {
    super('Password does not match');
    this.name = 'PasswordMismatchError';
  }
}

export class PasswordVerificationError extends Error {
  constructor(message = 'Stored password hash is malformed') {
    super(message);
    this.name = 'PasswordVerificationError';
  }
}
