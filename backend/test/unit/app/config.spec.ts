import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

const REQUIRED = {
  DATABASE_URL: 'postgres://localhost:5432/keystone',
  REDIS_URL: 'redis://localhost:6379',
  JWT_SECRET: 'test-secret-test-secret-test-secret-00',
};

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({ ...REQUIRED });

    expect(config).toMatchObject({
      nodeEnv: 'development',
      port: 3000,
      serviceName: 'keystone-backend',
      jwt: { accessTokenTtlSeconds: 86400, refreshTokenTtlSeconds: 604800 },
      sessionTtlSeconds: 86400,
      bcryptCost: 12,
      passwordPolicy: {
        minLength: 8,
        requireUppercase: true,
        requireLowercase: true,
        requireDigit: true,
        requireSpecial: true,
      },
      lockout: { threshold: 5, durationSeconds: 900 },
      resetTokenTtlSeconds: 3600,
      rateLimit: { enabled: true, prefix: 'rl' },
    });
  });

  it('parses "false" and "0" flags as false', () => {
    const config = buildConfig({
      ...REQUIRED,
      RATE_LIMIT_ENABLED: 'false',
      PASSWORD_REQUIRE_SPECIAL: '0',
    });

    expect(config.rateLimit.enabled).toBe(false);
    expect(config.passwordPolicy.requireSpecial).toBe(false);
  });

  it('coerces numeric values', () => {
    const config = buildConfig({ ...REQUIRED, PORT: '8080', LOCKOUT_THRESHOLD: '3' });

    expect(config.port).toBe(8080);
    expect(config.lockout.threshold).toBe(3);
  });

  it('rejects a short JWT secret', () => {
    expect(() => buildConfig({ ...REQUIRED, JWT_SECRET: 'short' })).toThrowError(
      /JWT_SECRET must be at least 32 characters/,
    );
  });

  it('rejects a bcrypt cost outside 10..15', () => {
    expect(() => buildConfig({ ...REQUIRED, BCRYPT_COST: '9' })).toThrow();
    expect(() => buildConfig({ ...REQUIRED, BCRYPT_COST: '16' })).toThrow();
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() => buildConfig({ ...REQUIRED, NODE_ENV: 'staging' })).toThrow();
  });

  it('requires DATABASE_URL', () => {
    expect(() => buildConfig({ REDIS_URL: REQUIRED.REDIS_URL, JWT_SECRET: REQUIRED.JWT_SECRET })).toThrow();
  });
});
