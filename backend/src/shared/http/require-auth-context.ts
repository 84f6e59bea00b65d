/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require a principal" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { TokenClaims } from '../security/token-issuer';

export type RequiredAuthContext = Readonly<{
  userId: string;
  claims: TokenClaims;
}>;

export type RequireAuthOptions = Readonly<{
  admin?: boolean;
}>;

/**
 * Guard sequence:
 * 1) no principal -> 401 "Authentication required"
 * 2) admin requested, principal is not admin -> 403 "Insufficient privileges."
 */
export function requireAuth(
  req: FastifyRequest,
  opts: RequireAuthOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.userId || !ctx.claims) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.admin && !ctx.claims.isAdmin) {
    throw AppError.forbidden('Insufficient privileges.');
  }

  return { userId: ctx.userId, claims: ctx.claims };
}
