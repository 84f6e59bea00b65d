import { describe, it, expect } from 'vitest';
import winston from 'winston';
import { createAppDeps } from '../../../src/app/di';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { InMemNotificationSender } from '../../../src/shared/messaging/inmem-notification-sender';
import { buildTestConfig } from '../../helpers/build-test-app';
import { InMemCredentialStore } from '../../helpers/inmem-credential-store';
import { InMemUserStore } from '../../helpers/inmem-user-store';

function infra(logger: winston.Logger) {
  return {
    cache: new InMemCache(),
    userStore: new InMemUserStore(),
    credentialStore: new InMemCredentialStore(),
    notificationSender: new InMemNotificationSender(),
    logger,
  };
}

describe('createAppDeps', () => {
  it('applies the configured log level to the logger', () => {
    const logger = winston.createLogger({ level: 'info', silent: true });

    const deps = createAppDeps(buildTestConfig({ logLevel: 'debug' }), infra(logger));

    expect(deps.logger).toBe(logger);
    expect(logger.level).toBe('debug');
  });

  it('disables the rate limiter when the config says so', async () => {
    const logger = winston.createLogger({ silent: true });
    const deps = createAppDeps(buildTestConfig({ rateLimit: { enabled: false, prefix: 'rl' } }), infra(logger));

    const policy = { name: 'tiny', requestsPerWindow: 1, burstSize: 1, windowSeconds: 60, skipSuccessful: false };
    await deps.rateLimiter.consume('k', policy);

    await expect(deps.rateLimiter.consume('k', policy)).resolves.toMatchObject({ allowed: true });
    expect(await deps.cache.get('rl:k')).toBeNull();
  });
});
