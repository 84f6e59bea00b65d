/**
 * backend/src/shared/security/jwt-token-issuer.ts
 *
 * WHY:
 * - Concrete TokenIssuer on top of `jsonwebtoken`, HMAC only.
 *
 * HOW TO USE:
 * - const issuer = new JwtTokenIssuer({ secret: config.jwt.secret })
 * - const pair = issuer.issuePair(subject, 86400, 604800)
 * - const claims = issuer.verify(pair.accessToken)   // throws InvalidTokenError
 *
 * RULES:
 * - The secret arrives through the constructor (from AppConfig). Never read env here.
 * - verify() pins the accepted algorithms to the HS family, so a header claiming
 *   `none` or an asymmetric algorithm is rejected before any signature work.
 * - iat/nbf/exp are written into the payload explicitly (no expiresIn option),
 *   so the returned expiresAt is exactly what ends up in the token.
 */

import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import {
  InvalidTokenError,
  TOKEN_KINDS,
  TokenSigningError,
  type IssuedToken,
  type TokenClaims,
  type TokenIssuer,
  type TokenKind,
  type TokenPair,
  type TokenSubject,
} from './token-issuer';

const ACCEPTED_ALGORITHMS: jwt.Algorithm[] = ['HS256', 'HS384', 'HS512'];

const ClaimsSchema = z.object({
  userId: z.string().min(1),
  username: z.string(),
  email: z.string(),
  isAdmin: z.boolean(),
  isPremium: z.boolean(),
  kind: z.enum(TOKEN_KINDS),
  iat: z.number().int(),
  nbf: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

export class JwtTokenIssuer implements TokenIssuer {
  constructor(private readonly opts: { secret: string }) {}

  issue(subject: TokenSubject, kind: TokenKind, ttlSeconds: number): IssuedToken {
    const now = Math.floor(Date.now() / 1000);
    const exp = now + ttlSeconds;

    const claims: TokenClaims = {
      userId: subject.userId,
      username: subject.username,
      email: subject.email,
      isAdmin: subject.isAdmin,
      isPremium: subject.isPremium,
      kind,
      iat: now,
      nbf: now,
      exp,
      jti: randomUUID(),
    };

    let token: string;
    try {
      token = jwt.sign(claims, this.opts.secret, { algorithm: 'HS256' });
    } catch (err) {
      throw new TokenSigningError(err instanceof Error ? err.message : 'Token signing failed');
    }

    return { token, expiresAt: new Date(exp * 1000) };
  }

  issuePair(subject: TokenSubject, accessTtlSeconds: number, refreshTtlSeconds: number): TokenPair {
    const access = this.issue(subject, 'access', accessTtlSeconds);
    const refresh = this.issue(subject, 'refresh', refreshTtlSeconds);

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      expiresAt: access.expiresAt,
    };
  }

  verify(token: string): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.opts.secret, { algorithms: ACCEPTED_ALGORITHMS });
    } catch (err) {
      throw new InvalidTokenError(err instanceof Error ? err.message : 'verification failed');
    }

    const parsed = ClaimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new InvalidTokenError('malformed claims');
    }

    return parsed.data;
  }
}
