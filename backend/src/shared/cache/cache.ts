/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Sessions and rate-limit counters are short-lived state that must be fast and externalized.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)                          -> null on miss (a miss is not an error)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.del(key1, key2)
 * - cache.incr(key)                         -> post-increment value (atomic per key)
 * - cache.expire(key, ttlSeconds)
 * - cache.keys('user:42:sessions:*')        -> glob match (`*`, `?`)
 *
 * RULES:
 * - incr() never sets a TTL by itself. Callers that want "TTL on first increment"
 *   check for a return value of 1 and call expire().
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(...keys: string[]): Promise<void>;

  /**
   * Atomically increments a counter (missing key counts as 0) and returns the new value.
   */
  incr(key: string): Promise<number>;

  /**
   * Sets a TTL on an existing key. No-op if the key does not exist.
   */
  expire(key: string, ttlSeconds: number): Promise<void>;

  /**
   * Returns every live key matching a glob pattern.
   * O(N) on Redis. Only used for per-principal session sweeps.
   */
  keys(pattern: string): Promise<string[]>;
}
