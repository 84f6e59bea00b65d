/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Bearer-token authentication is resolved once per request, before any route runs,
 *   so controllers and the principal-keyed rate limiter can read `req.authContext`.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context on every request.
 * 2. If `Authorization: Bearer <token>` is present, the verifier is called.
 *    Valid token -> context populated. Invalid token -> context stays empty
 *    (routes that need a principal reject with 401 via requireAuth()).
 * 3. Infrastructure failures from the verifier are NOT swallowed; they surface as 500.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { TokenClaims } from '../security/token-issuer';
import { AppError } from './errors';

export type AuthContext = {
  userId: string | null;
  claims: TokenClaims | null;
};

export type AccessTokenVerifier = (token: string) => Promise<TokenClaims>;

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

const BEARER_RE = /^Bearer\s+(\S+)$/i;

export function extractBearerToken(header: unknown): string | null {
  if (typeof header !== 'string') return null;
  const match = BEARER_RE.exec(header.trim());
  return match?.[1] ?? null;
}

export function registerAuthContext(app: FastifyInstance, verify: AccessTokenVerifier) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', async (req: FastifyRequest) => {
    req.authContext = { userId: null, claims: null };

    const token = extractBearerToken(req.headers.authorization);
    if (!token) return;

    try {
      const claims = await verify(token);
      req.authContext = { userId: claims.userId, claims };
    } catch (err) {
      if (AppError.is(err, 'UNAUTHORIZED')) return;
      throw err;
    }
  });
}
