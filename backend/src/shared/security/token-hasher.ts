/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - We never store raw security tokens in the database (refresh, reset, email-verification).
 * - We store only a hash so a DB leak doesn't expose usable tokens.
 *
 * HOW TO USE:
 * - Generate raw token -> hash it -> store hash in DB
 * - When user presents token -> hasher.matches(presented, storedHash)
 */

export interface TokenHasher {
  hash(rawToken: string): string;

  /** Constant-time comparison of a presented raw token against a stored hash. */
  matches(rawToken: string, storedHash: string): boolean;
}
