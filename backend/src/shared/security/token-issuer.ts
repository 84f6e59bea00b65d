/**
 * backend/src/shared/security/token-issuer.ts
 *
 * WHY:
 * - Access/refresh tokens are signed claims; services depend on this interface,
 *   not on a JWT library.
 *
 * RULES:
 * - Tokens have two states only: valid or invalid. Revocation is not a token concern;
 *   the auth service compares refresh tokens against the stored hash.
 * - verify() does NOT check `kind`. Callers decide which kind they accept.
 */

export const TOKEN_KINDS = ['access', 'refresh'] as const;
export type TokenKind = (typeof TOKEN_KINDS)[number];

/** Identity snapshot that gets copied into claims. */
export type TokenSubject = {
  userId: string;
  username: string;
  email: string;
  isAdmin: boolean;
  isPremium: boolean;
};

export type TokenClaims = TokenSubject & {
  kind: TokenKind;
  /** unix seconds */
  iat: number;
  nbf: number;
  exp: number;
  jti: string;
};

export type IssuedToken = {
  token: string;
  expiresAt: Date;
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  /** Access token expiry. */
  expiresAt: Date;
};

export interface TokenIssuer {
  issue(subject: TokenSubject, kind: TokenKind, ttlSeconds: number): IssuedToken;
  issuePair(subject: TokenSubject, accessTtlSeconds: number, refreshTtlSeconds: number): TokenPair;
  verify(token: string): TokenClaims;
}

export class InvalidTokenError extends Error {
  constructor(readonly reason: string) {
    super('Invalid token');
    this.name = 'InvalidTokenError';
  }
}

export class TokenSigningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenSigningError';
  }
}
