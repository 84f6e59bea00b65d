import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';

describe('InMemCache', () => {
  let cache: InMemCache;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    cache = new InMemCache();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('expires values at their ttl', async () => {
    await cache.set('k', 'v', { ttlSeconds: 5 });
    expect(await cache.get('k')).toBe('v');

    vi.setSystemTime(new Date('2026-01-01T00:00:05Z'));
    expect(await cache.get('k')).toBeNull();
  });

  it('incr starts at 1 and keeps an existing ttl', async () => {
    expect(await cache.incr('n')).toBe(1);
    await cache.expire('n', 10);
    expect(await cache.incr('n')).toBe(2);

    vi.setSystemTime(new Date('2026-01-01T00:00:10Z'));
    expect(await cache.incr('n')).toBe(1);
  });

  it('expire on a missing key is a no-op', async () => {
    await cache.expire('missing', 10);
    expect(await cache.get('missing')).toBeNull();
  });

  it('keys matches glob patterns literally apart from * and ?', async () => {
    await cache.set('user:1:sessions:a', 'a');
    await cache.set('user:1:sessions:b', 'b');
    await cache.set('user:10:sessions:c', 'c');

    expect(await cache.keys('user:1:sessions:*')).toEqual(['user:1:sessions:a', 'user:1:sessions:b']);
    expect(await cache.keys('user:1?:sessions:*')).toEqual(['user:10:sessions:c']);
  });

  it('del removes several keys at once', async () => {
    await cache.set('a', '1');
    await cache.set('b', '2');
    await cache.del('a', 'b');

    expect(await cache.keys('*')).toEqual([]);
  });
});
