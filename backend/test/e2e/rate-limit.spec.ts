import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import { ErrorResponseSchema } from '../helpers/http-schemas';

/**
 * E2E tests for the HTTP rate-limit hooks (limiter enabled, in-memory cache).
 */
describe('rate limiting (E2E)', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp({ rateLimit: { enabled: true, prefix: 'rl' } });
  });

  afterEach(async () => {
    await t.close();
  });

  it('sets X-RateLimit headers from the app-wide default preset', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['x-ratelimit-limit']).toBe('60');
    expect(res.headers['x-ratelimit-remaining']).toBe('59');
  });

  it('answers 429 once the strict login burst is exhausted', async () => {
    const attempt = () =>
      t.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'nobody@example.com', password: 'Wrong-horse1' },
      });

    for (let i = 0; i < 5; i++) {
      expect((await attempt()).statusCode).toBe(401);
    }

    const res = await attempt();
    expect(res.statusCode).toBe(429);
    expect(res.headers['x-ratelimit-limit']).toBe('30');
    expect(Number(res.headers['retry-after'])).toBeGreaterThanOrEqual(0);
    expect(ErrorResponseSchema.parse(res.json())).toEqual({
      error: { code: 'RATE_LIMITED', message: 'Too many requests. Try again later.' },
    });
  });

  it('counts only failed requests for the authenticated-user preset', async () => {
    for (let i = 0; i < 3; i++) {
      await t.app.inject({ method: 'GET', url: '/auth/me' });
    }

    // onResponse hooks run after the reply is flushed.
    await vi.waitFor(async () => {
      expect(await t.cache.get('rl:authenticatedUser:ip:127.0.0.1')).toBe('3');
    });
  });
});
