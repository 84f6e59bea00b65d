/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Protects the whole API against request floods: a fixed window counter plus
 *   a short burst sub-window, both kept in the Cache (Redis in prod).
 * - Depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - const decision = await limiter.consume('default:ip:1.2.3.4', RATE_LIMIT_PRESETS.default.policy)
 * - if (!decision.allowed) throw new RateLimitError(decision)
 *
 * TWO MODES:
 * - consume(): increment both counters first, then compare the post-increment values.
 *   Two concurrent requests can no longer both read "59" and both pass.
 * - check() + record(): read-only decision before the request, accounting after it.
 *   Needed by `skipSuccessful` policies, which only count requests that did not succeed.
 *   The gap between the read and the increment means N concurrent callers can all pass
 *   at the boundary; the limit is approximate there.
 *
 * FAIL-OPEN:
 * - A cache error never blocks traffic. The request is allowed and the error logged.
 *
 * DISABLING:
 * - Pass `disabled: true` in opts to skip all checks (decided in di.ts).
 * - Never check NODE_ENV here. The composition root decides.
 */

import type { Cache } from '../cache/cache';
import { errorMeta, logger as defaultLogger, type Logger } from '../logger/logger';

export const BURST_WINDOW_SECONDS = 10;

export type RateLimitPolicy = Readonly<{
  name: string;
  requestsPerWindow: number;
  burstSize: number;
  windowSeconds: number;
  /** Only count requests that did not end in a 2xx. */
  skipSuccessful: boolean;
}>;

export type RateLimitDecision = {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: Date;
};

export class RateLimitError extends Error {
  constructor(public readonly decision: RateLimitDecision) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

function windowResetAt(nowMs: number, windowSeconds: number): Date {
  const windowMs = windowSeconds * 1000;
  const windowStart = Math.floor(nowMs / windowMs) * windowMs;
  return new Date(windowStart + windowMs);
}

function toCount(raw: string | null): number {
  if (raw === null) return 0;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : 0;
}

export class RateLimiter {
  private readonly logger: Logger;

  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean; logger?: Logger },
  ) {
    this.logger = opts?.logger ?? defaultLogger;
  }

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  private allowAll(policy: RateLimitPolicy): RateLimitDecision {
    return {
      allowed: true,
      limit: policy.requestsPerWindow,
      remaining: policy.requestsPerWindow,
      resetAt: windowResetAt(Date.now(), policy.windowSeconds),
    };
  }

  /**
   * Read-only decision. Does not count the request.
   */
  async check(key: string, policy: RateLimitPolicy): Promise<RateLimitDecision> {
    if (this.opts?.disabled) return this.allowAll(policy);

    const fullKey = this.buildKey(key);
    const resetAt = windowResetAt(Date.now(), policy.windowSeconds);

    let count: number;
    let burst: number;
    try {
      count = toCount(await this.cache.get(fullKey));
      burst = toCount(await this.cache.get(`${fullKey}:burst`));
    } catch (err) {
      this.logger.error('rate_limit.store_error', { op: 'check', policy: policy.name, err: errorMeta(err) });
      return this.allowAll(policy);
    }

    if (count >= policy.requestsPerWindow || burst >= policy.burstSize) {
      return {
        allowed: false,
        limit: policy.requestsPerWindow,
        remaining: Math.max(0, policy.requestsPerWindow - count),
        resetAt,
      };
    }

    return {
      allowed: true,
      limit: policy.requestsPerWindow,
      remaining: policy.requestsPerWindow - count - 1,
      resetAt,
    };
  }

  /**
   * Post-request accounting for check(). Errors are logged, never thrown.
   */
  async record(key: string, policy: RateLimitPolicy): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(key);
    try {
      await this.bump(fullKey, policy.windowSeconds);
      await this.bump(`${fullKey}:burst`, BURST_WINDOW_SECONDS);
    } catch (err) {
      this.logger.error('rate_limit.store_error', { op: 'record', policy: policy.name, err: errorMeta(err) });
    }
  }

  /**
   * Counts the request and decides on the post-increment values.
   */
  async consume(key: string, policy: RateLimitPolicy): Promise<RateLimitDecision> {
    if (this.opts?.disabled) return this.allowAll(policy);

    const fullKey = this.buildKey(key);
    const resetAt = windowResetAt(Date.now(), policy.windowSeconds);

    let count: number;
    let burst: number;
    try {
      count = await this.bump(fullKey, policy.windowSeconds);
      burst = await this.bump(`${fullKey}:burst`, BURST_WINDOW_SECONDS);
    } catch (err) {
      this.logger.error('rate_limit.store_error', { op: 'consume', policy: policy.name, err: errorMeta(err) });
      return this.allowAll(policy);
    }

    return {
      allowed: count <= policy.requestsPerWindow && burst <= policy.burstSize,
      limit: policy.requestsPerWindow,
      remaining: Math.max(0, policy.requestsPerWindow - count),
      resetAt,
    };
  }

  // TTL is attached only when the counter is created, so it never slides.
  private async bump(key: string, ttlSeconds: number): Promise<number> {
    const value = await this.cache.incr(key);
    if (value === 1) {
      await this.cache.expire(key, ttlSeconds);
    }
    return value;
  }
}
