/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is a battle-tested, cost-parameterized password hashing algorithm.
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const { hash, salt } = await hasher.hash('secret')
 * - await hasher.verify('secret', hash, salt)
 *
 * SALT:
 * - A separate 16-byte random salt is appended to the password before bcrypt runs.
 *   It is returned (and stored) separately from the hash string; bcrypt's own
 *   embedded salt still applies on top.
 * - bcrypt ignores input past 72 bytes. hash() refuses such input instead of letting
 *   two passwords collide on their first 72 bytes; verify() treats it as a mismatch,
 *   since no stored hash could have come from it.
 */

import { randomBytes } from 'node:crypto';
import bcrypt from 'bcrypt';
import {
  PasswordMismatchError,
  PasswordVerificationError,
  type HashedPassword,
  type PasswordHasher,
} from './password-hasher';
import { PasswordTooLongError } from './password-policy';

export const DEFAULT_BCRYPT_COST = 12;
const SALT_BYTES = 16;
const BCRYPT_MAX_INPUT_BYTES = 72;

function fitsBcrypt(input: string): boolean {
  return Buffer.byteLength(input, 'utf8') <= BCRYPT_MAX_INPUT_BYTES;
}

const BCRYPT_HASH_RE = /^\$2[abxy]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? DEFAULT_BCRYPT_COST;
  }

  async hash(plain: string): Promise<HashedPassword> {
    const salt = randomBytes(SALT_BYTES).toString('base64');
    if (!fitsBcrypt(plain + salt)) {
      throw new PasswordTooLongError(BCRYPT_MAX_INPUT_BYTES - salt.length);
    }
    const hash = await bcrypt.hash(plain + salt, this.cost);
    return { hash, salt };
  }

  async verify(plain: string, hash: string, salt: string): Promise<void> {
    // bcrypt.compare() answers `false` for garbage hashes; we want that to be loud.
    if (!BCRYPT_HASH_RE.test(hash)) {
      throw new PasswordVerificationError();
    }

    if (!fitsBcrypt(plain + salt)) {
      throw new PasswordMismatchError();
    }

    let matches: boolean;
    try {
      matches = await bcrypt.compare(plain + salt, hash);
    } catch (err) {
      throw new PasswordVerificationError(
        err instanceof Error ? err.message : 'Password verification failed',
      );
    }

    if (!matches) {
      throw new PasswordMismatchError();
    }
  }
}
