/**
 * backend/src/modules/auth/flows/refresh/execute-refresh-flow.ts
 *
 * WHY:
 * - Refresh-token rotation: a refresh token is accepted only if it is the one most
 *   recently stored for the principal; using it replaces it.
 *
 * RULES:
 * - Every rejection is the same Unauthorized (bad signature, expired, wrong kind,
 *   unknown principal, revoked, superseded).
 * - Comparison against the stored hash is constant-time (TokenHasher.matches).
 */

import { InvalidTokenError, type TokenClaims } from '../../../../shared/security/token-issuer';

import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import type { OperationOptions, TokenPairResult } from '../../auth.types';
import { issueTokenPair } from '../../helpers/issue-token-pair';

export async function executeRefreshFlow(
  deps: Pick<
    AuthDeps,
    'userStore' | 'credentialStore' | 'tokenHasher' | 'tokenIssuer' | 'logger' | 'config'
  >,
  refreshToken: string,
  opts: OperationOptions = {},
): Promise<TokenPairResult> {
  let claims: TokenClaims;
  try {
    claims = deps.tokenIssuer.verify(refreshToken);
  } catch (err) {
    if (err instanceof InvalidTokenError) {
      deps.logger.warn({ msg: 'auth.refresh.failed', flow: 'auth.refresh', reason: err.reason });
      throw AuthErrors.invalidToken();
    }
    throw err;
  }

  if (claims.kind !== 'refresh') {
    deps.logger.warn({ msg: 'auth.refresh.failed', flow: 'auth.refresh', reason: 'wrong_kind' });
    throw AuthErrors.invalidToken();
  }

  const user = await deps.userStore.getUserById(claims.userId);
  const credential = user ? await deps.credentialStore.getCredentialByPrincipalId(user.id) : undefined;

  if (!user || !credential) {
    deps.logger.warn({
      msg: 'auth.refresh.failed',
      flow: 'auth.refresh',
      userId: claims.userId,
      reason: 'principal_missing',
    });
    throw AuthErrors.invalidToken();
  }

  if (
    credential.refreshTokenHash === null ||
    !deps.tokenHasher.matches(refreshToken, credential.refreshTokenHash)
  ) {
    deps.logger.warn({
      msg: 'auth.refresh.failed',
      flow: 'auth.refresh',
      userId: user.id,
      reason: credential.refreshTokenHash === null ? 'revoked' : 'superseded',
    });
    throw AuthErrors.invalidToken();
  }

  opts.signal?.throwIfAborted();

  const tokens = await issueTokenPair(deps, user);

  deps.logger.info({ msg: 'auth.refresh.success', flow: 'auth.refresh', userId: user.id });

  return tokens;
}
