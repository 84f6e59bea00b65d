import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { logger } from '../../../../src/shared/logger/logger';
import { SessionStore } from '../../../../src/shared/session/session.store';
import { SessionNotFoundError } from '../../../../src/shared/session/session.types';

const T0 = new Date('2026-01-01T00:00:00Z');

describe('SessionStore', () => {
  let cache: InMemCache;
  let store: SessionStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
    cache = new InMemCache();
    store = new SessionStore(cache, logger, 3600);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates a session with a 64-char hex id and the default ttl', async () => {
    const s = await store.create('usr_1', 'vitest', '203.0.113.7');

    expect(s.id).toMatch(/^[0-9a-f]{64}$/);
    expect(s).toMatchObject({
      principalId: 'usr_1',
      userAgent: 'vitest',
      ip: '203.0.113.7',
      createdAt: '2026-01-01T00:00:00.000Z',
      expiresAt: '2026-01-01T01:00:00.000Z',
    });
    expect(await store.get(s.id)).toEqual(s);
  });

  it('indexes the session under its principal', async () => {
    const s = await store.create('usr_1', 'vitest', '203.0.113.7');

    expect(await cache.keys('user:usr_1:sessions:*')).toEqual([`user:usr_1:sessions:${s.id}`]);
  });

  it('returns null for an unknown id', async () => {
    expect(await store.get('0'.repeat(64))).toBeNull();
  });

  it('returns null once the ttl has passed', async () => {
    const s = await store.create('usr_1', 'vitest', '203.0.113.7', 1);

    vi.setSystemTime(new Date(T0.getTime() + 2000));

    expect(await store.get(s.id)).toBeNull();
    expect(await cache.keys('user:usr_1:sessions:*')).toEqual([]);
  });

  it('deletes a record whose expiresAt has passed even if the cache still holds it', async () => {
    const id = 'a'.repeat(64);
    await cache.set(
      `session:${id}`,
      JSON.stringify({
        id,
        principalId: 'usr_1',
        userAgent: 'vitest',
        ip: '203.0.113.7',
        createdAt: '2025-12-31T22:00:00.000Z',
        expiresAt: '2025-12-31T23:00:00.000Z',
      }),
    );
    await cache.set(`user:usr_1:sessions:${id}`, id);

    expect(await store.get(id)).toBeNull();
    expect(await cache.get(`session:${id}`)).toBeNull();
    expect(await cache.get(`user:usr_1:sessions:${id}`)).toBeNull();
  });

  it('drops a corrupt record', async () => {
    const id = 'b'.repeat(64);
    await cache.set(`session:${id}`, '{not json');

    expect(await store.get(id)).toBeNull();
    expect(await cache.get(`session:${id}`)).toBeNull();
  });

  it('delete() removes the record and its index entry', async () => {
    const s = await store.create('usr_1', 'vitest', '203.0.113.7');

    await store.delete(s.id);

    expect(await store.get(s.id)).toBeNull();
    expect(await cache.keys('user:usr_1:sessions:*')).toEqual([]);
  });

  it("deleteAllForPrincipal() removes only that principal's sessions", async () => {
    const a = await store.create('usr_1', 'vitest', '203.0.113.7');
    const b = await store.create('usr_1', 'curl', '203.0.113.8');
    const other = await store.create('usr_2', 'vitest', '203.0.113.9');

    expect(await store.deleteAllForPrincipal('usr_1')).toBe(2);

    expect(await store.get(a.id)).toBeNull();
    expect(await store.get(b.id)).toBeNull();
    expect(await store.get(other.id)).toEqual(other);
  });

  it('refresh() moves expiresAt to now + ttl', async () => {
    const s = await store.create('usr_1', 'vitest', '203.0.113.7', 60);

    vi.setSystemTime(new Date(T0.getTime() + 30_000));
    const refreshed = await store.refresh(s.id, 120);

    expect(refreshed.expiresAt).toBe('2026-01-01T00:02:30.000Z');
    expect(refreshed.createdAt).toBe(s.createdAt);

    // Past the original ttl, still alive.
    vi.setSystemTime(new Date(T0.getTime() + 90_000));
    expect(await store.get(s.id)).toEqual(refreshed);
    expect(await cache.keys('user:usr_1:sessions:*')).toEqual([`user:usr_1:sessions:${s.id}`]);
  });

  it('refresh() of an unknown session throws SessionNotFoundError', async () => {
    await expect(store.refresh('c'.repeat(64), 60)).rejects.toBeInstanceOf(SessionNotFoundError);
  });
});
