/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Keeps modules testable: createAppDeps() takes the infra as input, so tests hand
 *   in in-memory stores and caches instead of Postgres/Redis.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. rate limits on/off) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';
import type { TokenIssuer } from '../shared/security/token-issuer';
import { JwtTokenIssuer } from '../shared/security/jwt-token-issuer';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger as defaultLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { SessionStore } from '../shared/session/session.store';

import type { NotificationSender } from '../shared/messaging/notification-sender';
import { LogNotificationSender } from '../shared/messaging/log-notification-sender';

import { createUserModule } from '../modules/users/user.module';
import type { UserStore } from '../modules/users';

import { createAuthModule, createKyselyCredentialStore } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';
import type { CredentialStore } from '../modules/auth/credential.store';

/** Everything that talks to the outside world. */
export type AppInfra = {
  cache: Cache;
  userStore: UserStore;
  credentialStore: CredentialStore;
  notificationSender: NotificationSender;
  logger?: Logger;
  close?: () => Promise<void>;
};

export type AppDeps = {
  cache: Cache;
  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  tokenIssuer: TokenIssuer;
  passwordHasher: PasswordHasher;
  sessionStore: SessionStore;
  notificationSender: NotificationSender;

  userStore: UserStore;
  credentialStore: CredentialStore;

  // modules
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

/**
 * Pure wiring: no connections opened here.
 */
export function createAppDeps(config: AppConfig, infra: AppInfra): AppDeps {
  const logger = infra.logger ?? defaultLogger;
  logger.level = config.logLevel;

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const tokenIssuer: TokenIssuer = new JwtTokenIssuer({ secret: config.jwt.secret });
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(infra.cache, {
    prefix: config.rateLimit.prefix,
    disabled: !config.rateLimit.enabled,
    logger,
  });

  const sessionStore = new SessionStore(infra.cache, logger, config.sessionTtlSeconds);

  const auth = createAuthModule({
    userStore: infra.userStore,
    credentialStore: infra.credentialStore,
    passwordHasher,
    tokenHasher,
    tokenIssuer,
    sessionStore,
    notificationSender: infra.notificationSender,
    rateLimiter,
    logger,
    config: {
      accessTokenTtlSeconds: config.jwt.accessTokenTtlSeconds,
      refreshTokenTtlSeconds: config.jwt.refreshTokenTtlSeconds,
      sessionTtlSeconds: config.sessionTtlSeconds,
      resetTokenTtlSeconds: config.resetTokenTtlSeconds,
      passwordPolicy: config.passwordPolicy,
      lockout: {
        threshold: config.lockout.threshold,
        lockDurationSeconds: config.lockout.durationSeconds,
      },
    },
  });

  return {
    cache: infra.cache,
    logger,
    rateLimiter,
    tokenHasher,
    tokenIssuer,
    passwordHasher,
    sessionStore,
    notificationSender: infra.notificationSender,
    userStore: infra.userStore,
    credentialStore: infra.credentialStore,
    auth,
    close: infra.close ?? (() => Promise.resolve()),
  };
}

/**
 * Production infra: Postgres (Kysely) + Redis.
 */
export async function buildInfra(config: AppConfig): Promise<AppInfra> {
  const db = createDb(config.databaseUrl);

  // Redis is mandatory (dev + prod)
  const redis = await RedisCache.connect(config.redisUrl);

  const users = createUserModule({ db });

  return {
    cache: redis,
    userStore: users.userStore,
    credentialStore: createKyselyCredentialStore(db),
    // Swap for a real mail provider adapter here.
    notificationSender: new LogNotificationSender(defaultLogger),
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}
