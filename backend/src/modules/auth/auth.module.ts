/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { NotificationSender } from '../../shared/messaging/notification-sender';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { TokenIssuer } from '../../shared/security/token-issuer';
import type { SessionStore } from '../../shared/session/session.store';
import type { UserStore } from '../users';

import type { AuthConfig } from './auth.deps';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { AuthService } from './auth.service';
import type { CredentialStore } from './credential.store';
import { toStoreError } from '../../shared/db/store-error';
import { CredentialRepo } from './dal/credential.repo';
import { AccountGuard, type LockoutPolicy } from './policies/account-guard.policy';
import {
  getCredentialByUserId,
  getCredentialByVerificationTokenHash,
} from './queries/credential.queries';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createKyselyCredentialStore(
  db: DbExecutor,
  repo: CredentialRepo = new CredentialRepo(db),
): CredentialStore {
  return {
    createCredential: (input) => repo.insertCredential(input),
    getCredentialByPrincipalId: (userId) => getCredentialByUserId(db, userId),
    getByVerificationToken: (tokenHash) => getCredentialByVerificationTokenHash(db, tokenHash),
    updatePasswordHash: (userId, passwordHash, passwordSalt) =>
      repo.updatePasswordHash({ userId, passwordHash, passwordSalt }),
    setResetToken: (userId, tokenHash, expiresAt) => repo.setResetToken({ userId, tokenHash, expiresAt }),
    clearResetToken: (userId) => repo.clearResetToken({ userId }),
    verifyEmail: (userId) => repo.markEmailVerified({ userId }),
    updateLastLogin: (userId, at) => repo.updateLastLogin({ userId, at }),
    incrementFailedAttempts: (userId) => repo.incrementFailedAttempts({ userId }),
    setLockout: (userId, lockedUntil) => repo.setLockout({ userId, lockedUntil }),
    clearLockout: (userId) => repo.clearLockout({ userId }),
    storeRefreshToken: (userId, tokenHash) => repo.setRefreshTokenHash({ userId, tokenHash }),
    invalidateRefreshToken: (userId) => repo.setRefreshTokenHash({ userId, tokenHash: null }),

    async transaction<T>(fn: (store: CredentialStore) => Promise<T>): Promise<T> {
      try {
        return await db
          .transaction()
          .execute((trx) => fn(createKyselyCredentialStore(trx, repo.withDb(trx))));
      } catch (err) {
        throw toStoreError(err, 'credentials.transaction');
      }
    },
  };
}

export function createAuthModule(deps: {
  userStore: UserStore;
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  tokenIssuer: TokenIssuer;
  sessionStore: SessionStore;
  notificationSender: NotificationSender;
  rateLimiter: RateLimiter;
  logger: Logger;
  config: AuthConfig & { lockout: LockoutPolicy };
}) {
  const authService = new AuthService({
    userStore: deps.userStore,
    credentialStore: deps.credentialStore,
    passwordHasher: deps.passwordHasher,
    tokenHasher: deps.tokenHasher,
    tokenIssuer: deps.tokenIssuer,
    sessionStore: deps.sessionStore,
    accountGuard: new AccountGuard(deps.config.lockout),
    notificationSender: deps.notificationSender,
    logger: deps.logger,
    config: deps.config,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller, deps.rateLimiter);
    },
  };
}
