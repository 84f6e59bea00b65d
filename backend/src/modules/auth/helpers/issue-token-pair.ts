/**
 * src/modules/auth/helpers/issue-token-pair.ts
 *
 * WHY:
 * - login() and refresh() both mint a pair and make its refresh token the ONLY valid one.
 *
 * RULES:
 * - Only the refresh token's hash is persisted; storing it overwrites (revokes) the previous one.
 * - Signing failures are not caught here (the service maps them).
 */

import type { TokenHasher } from '../../../shared/security/token-hasher';
import type { TokenIssuer } from '../../../shared/security/token-issuer';
import type { User } from '../../users';
import type { CredentialStore } from '../credential.store';
import type { TokenPairResult } from '../auth.types';
import { toPublicUser, toTokenSubject } from './to-public-user';

export async function issueTokenPair(
  deps: {
    tokenIssuer: TokenIssuer;
    tokenHasher: TokenHasher;
    credentialStore: CredentialStore;
    config: { accessTokenTtlSeconds: number; refreshTokenTtlSeconds: number };
  },
  user: User,
): Promise<TokenPairResult> {
  const pair = deps.tokenIssuer.issuePair(
    toTokenSubject(user),
    deps.config.accessTokenTtlSeconds,
    deps.config.refreshTokenTtlSeconds,
  );

  await deps.credentialStore.storeRefreshToken(user.id, deps.tokenHasher.hash(pair.refreshToken));

  return {
    accessToken: pair.accessToken,
    refreshToken: pair.refreshToken,
    expiresAt: pair.expiresAt,
    user: toPublicUser(user),
  };
}
