/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * WHY:
 * - Concrete TokenHasher implementation using SHA-256.
 * - Tokens are already high-entropy, so a fast hash is enough (unlike passwords).
 *
 * HOW TO USE:
 * - const hasher = new Sha256TokenHasher()
 * - const hash = hasher.hash(token)
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }

  matches(rawToken: string, storedHash: string): boolean {
    const presented = Buffer.from(this.hash(rawToken), 'hex');
    const stored = Buffer.from(storedHash, 'hex');

    // Both are SHA-256 digests when the stored value is well-formed.
    if (presented.length !== stored.length) return false;
    return timingSafeEqual(presented, stored);
  }
}
