/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - Secret material (JWT secret) leaves this file only inside AppConfig and is
 *   handed to constructors by di.ts. Nothing else reads process.env for it.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() treats "false" as true; env flags need an explicit parser.
const envFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('keystone-backend'),

  // Tokens
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).default(86400),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).default(604800),

  // Session
  SESSION_TTL_SECONDS: z.coerce.number().int().min(60).max(604800).default(86400),

  // Passwords
  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),
  PASSWORD_MIN_LENGTH: z.coerce.number().int().min(8).max(128).default(8),
  PASSWORD_REQUIRE_UPPERCASE: envFlag(true),
  PASSWORD_REQUIRE_LOWERCASE: envFlag(true),
  PASSWORD_REQUIRE_DIGIT: envFlag(true),
  PASSWORD_REQUIRE_SPECIAL: envFlag(true),

  // Lockout / reset
  LOCKOUT_THRESHOLD: z.coerce.number().int().min(1).default(5),
  LOCKOUT_DURATION_SECONDS: z.coerce.number().int().min(1).default(900),
  RESET_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).default(3600),

  // Rate limiting
  RATE_LIMIT_ENABLED: envFlag(true),
  RATE_LIMIT_PREFIX: z.string().min(1).default('rl'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  jwt: {
    secret: string;
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
  };

  sessionTtlSeconds: number;

  bcryptCost: number;
  passwordPolicy: {
    minLength: number;
    requireUppercase: boolean;
    requireLowercase: boolean;
    requireDigit: boolean;
    requireSpecial: boolean;
  };

  lockout: {
    threshold: number;
    durationSeconds: number;
  };
  resetTokenTtlSeconds: number;

  rateLimit: {
    enabled: boolean;
    prefix: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    jwt: {
      secret: parsed.JWT_SECRET,
      accessTokenTtlSeconds: parsed.ACCESS_TOKEN_TTL_SECONDS,
      refreshTokenTtlSeconds: parsed.REFRESH_TOKEN_TTL_SECONDS,
    },

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    bcryptCost: parsed.BCRYPT_COST,
    passwordPolicy: {
      minLength: parsed.PASSWORD_MIN_LENGTH,
      requireUppercase: parsed.PASSWORD_REQUIRE_UPPERCASE,
      requireLowercase: parsed.PASSWORD_REQUIRE_LOWERCASE,
      requireDigit: parsed.PASSWORD_REQUIRE_DIGIT,
      requireSpecial: parsed.PASSWORD_REQUIRE_SPECIAL,
    },

    lockout: {
      threshold: parsed.LOCKOUT_THRESHOLD,
      durationSeconds: parsed.LOCKOUT_DURATION_SECONDS,
    },
    resetTokenTtlSeconds: parsed.RESET_TOKEN_TTL_SECONDS,

    rateLimit: {
      enabled: parsed.RATE_LIMIT_ENABLED,
      prefix: parsed.RATE_LIMIT_PREFIX,
    },
  };
}
