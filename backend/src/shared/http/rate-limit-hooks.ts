/**
 * backend/src/shared/http/rate-limit-hooks.ts
 *
 * WHY:
 * - The RateLimiter decides; this file binds it to Fastify requests:
 *   key generation, presets, response headers, and 429s.
 *
 * HOW TO USE:
 * - app-wide:    applyRateLimit(app, limiter, RATE_LIMIT_PRESETS.default)
 * - route group: inside app.register(async (scope) => { applyRateLimit(scope, limiter, RATE_LIMIT_PRESETS.strict); ... })
 *
 * RULES:
 * - Keys are `<presetName>:<generated key>`; the limiter adds the namespace prefix.
 * - Presets with `skipSuccessful` decide with check() and count in onResponse,
 *   and only for non-2xx responses that were not themselves rate limited.
 *   Every other preset uses consume().
 * - Principal keys rely on req.authContext, so registerAuthContext() must run first.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  RateLimitError,
  type RateLimitDecision,
  type RateLimiter,
  type RateLimitPolicy,
} from '../security/rate-limit';

export type KeyGenerator = (req: FastifyRequest) => string;

export const keyByIp: KeyGenerator = (req) => `ip:${req.ip}`;

/** Falls back to the caller's IP for unauthenticated requests. */
export const keyByPrincipal: KeyGenerator = (req) => {
  const userId = req.authContext?.userId;
  return userId ? `user:${userId}` : keyByIp(req);
};

/** One bucket per route pattern and caller IP. */
export const keyByEndpoint: KeyGenerator = (req) =>
  `endpoint:${req.method}:${req.routeOptions.url ?? req.url}:${req.ip}`;

export type RateLimitPreset = Readonly<{
  policy: RateLimitPolicy;
  keyGenerator: KeyGenerator;
}>;

export const RATE_LIMIT_PRESETS = {
  default: {
    policy: { name: 'default', requestsPerWindow: 60, burstSize: 10, windowSeconds: 60, skipSuccessful: false },
    keyGenerator: keyByIp,
  },
  strict: {
    policy: { name: 'strict', requestsPerWindow: 30, burstSize: 5, windowSeconds: 60, skipSuccessful: false },
    keyGenerator: keyByIp,
  },
  authenticatedUser: {
    policy: {
      name: 'authenticatedUser',
      requestsPerWindow: 120,
      burstSize: 20,
      windowSeconds: 60,
      skipSuccessful: true,
    },
    keyGenerator: keyByPrincipal,
  },
  expensiveOperation: {
    policy: {
      name: 'expensiveOperation',
      requestsPerWindow: 10,
      burstSize: 2,
      windowSeconds: 60,
      skipSuccessful: false,
    },
    keyGenerator: keyByPrincipal,
  },
} as const satisfies Record<string, RateLimitPreset>;

export type RateLimitPresetName = keyof typeof RATE_LIMIT_PRESETS;

function setRateLimitHeaders(reply: FastifyReply, decision: RateLimitDecision): void {
  reply.header('X-RateLimit-Limit', String(decision.limit));
  reply.header('X-RateLimit-Remaining', String(decision.remaining));
  reply.header('X-RateLimit-Reset', String(Math.floor(decision.resetAt.getTime() / 1000)));
}

export function createRateLimitHooks(limiter: RateLimiter, preset: RateLimitPreset) {
  const { policy, keyGenerator } = preset;
  const denied = new WeakSet<FastifyRequest>();

  const keyFor = (req: FastifyRequest) => `${policy.name}:${keyGenerator(req)}`;

  return {
    async onRequest(req: FastifyRequest, reply: FastifyReply): Promise<void> {
      const key = keyFor(req);
      const decision = policy.skipSuccessful
        ? await limiter.check(key, policy)
        : await limiter.consume(key, policy);

      setRateLimitHeaders(reply, decision);

      if (!decision.allowed) {
        denied.add(req);
        throw new RateLimitError(decision);
      }
    },

    async onResponse(req: FastifyRequest, reply: FastifyReply): Promise<void> {
      if (!policy.skipSuccessful || denied.has(req)) return;
      if (reply.statusCode >= 200 && reply.statusCode < 300) return;

      await limiter.record(keyFor(req), policy);
    },
  };
}

export function applyRateLimit(
  app: FastifyInstance,
  limiter: RateLimiter,
  preset: RateLimitPreset,
): void {
  const hooks = createRateLimitHooks(limiter, preset);
  app.addHook('onRequest', hooks.onRequest);
  app.addHook('onResponse', hooks.onResponse);
}
