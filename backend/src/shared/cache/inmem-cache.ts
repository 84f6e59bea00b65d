/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev if Redis is down) to run without external infra.
 * - Mirrors the Redis semantics the app relies on: TTL expiry on read,
 *   INCR on a missing key starts at 1, EXPIRE on a missing key is a no-op,
 *   KEYS with glob patterns.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - Time comes from Date.now(), so vi.setSystemTime() drives expiry in tests.
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();

  private now(): number {
    return Date.now();
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(...keys: string[]): Promise<void> {
    for (const key of keys) this.store.delete(key);
    return Promise.resolve();
  }

  incr(key: string): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Like Redis INCR: the existing TTL (if any) is preserved.
    this.store.set(key, { value: String(next), expiresAtMs: entry?.expiresAtMs ?? null });

    return Promise.resolve(next);
  }

  expire(key: string, ttlSeconds: number): Promise<void> {
    const entry = this.getEntry(key);
    if (entry) {
      entry.expiresAtMs = this.now() + ttlSeconds * 1000;
    }
    return Promise.resolve();
  }

  keys(pattern: string): Promise<string[]> {
    const re = globToRegExp(pattern);
    const out: string[] = [];

    for (const key of Array.from(this.store.keys())) {
      if (re.test(key) && this.getEntry(key)) out.push(key);
    }

    return Promise.resolve(out);
  }
}
