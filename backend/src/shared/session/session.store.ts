/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session lifecycle over the Cache (Redis in prod).
 * - Sessions are independent of JWTs and instantly revocable via delete().
 *
 * PER-PRINCIPAL INDEX:
 * - create() writes a pointer key `user:{principalId}:sessions:{sessionId}` next to the record.
 * - deleteAllForPrincipal() discovers sessions with keys('user:{id}:sessions:*').
 *
 * EXPIRY:
 * - The cache TTL removes records eventually; get() also checks `expiresAt` itself
 *   and deletes a stale record (lazy expiry), so a stale record is never returned.
 *
 * RULES:
 * - Depends only on Cache interface (DIP). Works with Redis in prod, InMemCache in tests.
 * - Pointer writes/deletes are best-effort: failures are logged, the primary record wins.
 * - No HTTP concerns here. No business rules.
 */

import type { Cache } from '../cache/cache';
import { errorMeta, type Logger } from '../logger/logger';
import { generateHexId } from '../security/token';
import {
  DEFAULT_SESSION_TTL_SECONDS,
  SESSION_KEY_PREFIX,
  SessionNotFoundError,
  SessionRecordSchema,
  type SessionRecord,
} from './session.types';

const SESSION_ID_BYTES = 32;

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly logger: Logger,
    private readonly defaultTtlSeconds: number = DEFAULT_SESSION_TTL_SECONDS,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  private pointerKey(principalId: string, sessionId: string): string {
    return `user:${principalId}:sessions:${sessionId}`;
  }

  async create(
    principalId: string,
    userAgent: string,
    ip: string,
    ttlSeconds: number = this.defaultTtlSeconds,
  ): Promise<SessionRecord> {
    const id = generateHexId(SESSION_ID_BYTES);
    const now = Date.now();

    const record: SessionRecord = {
      id,
      principalId,
      userAgent,
      ip,
      createdAt: new Date(now).toISOString(),
      expiresAt: new Date(now + ttlSeconds * 1000).toISOString(),
    };

    await this.cache.set(this.key(id), JSON.stringify(record), { ttlSeconds });

    try {
      await this.cache.set(this.pointerKey(principalId, id), id, { ttlSeconds });
    } catch (err) {
      this.logger.warn('session.pointer_write_failed', { sessionId: id, principalId, err: errorMeta(err) });
    }

    return record;
  }

  /**
   * Returns null if missing, corrupt, or past its expiresAt.
   */
  async get(sessionId: string): Promise<SessionRecord | null> {
    const record = await this.readRaw(sessionId);
    if (!record) return null;

    if (Date.parse(record.expiresAt) < Date.now()) {
      await this.deleteRecord(record);
      return null;
    }

    return record;
  }

  /**
   * Reads the stored record without the expiry check, so delete() can find the
   * principal of a record that has already lapsed.
   */
  private async readRaw(sessionId: string): Promise<SessionRecord | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = undefined;
    }

    const result = SessionRecordSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('session.corrupt_record', { sessionId });
      await this.cache.del(this.key(sessionId));
      return null;
    }

    return result.data;
  }

  async delete(sessionId: string): Promise<void> {
    const record = await this.readRaw(sessionId);
    if (!record) {
      await this.cache.del(this.key(sessionId));
      return;
    }

    await this.deleteRecord(record);
  }

  private async deleteRecord(record: SessionRecord): Promise<void> {
    try {
      await this.cache.del(this.pointerKey(record.principalId, record.id));
    } catch (err) {
      this.logger.warn('session.pointer_delete_failed', {
        sessionId: record.id,
        principalId: record.principalId,
        err: errorMeta(err),
      });
    }

    await this.cache.del(this.key(record.id));
  }

  /**
   * Deletes every session of a principal. Individual failures are logged and
   * the sweep continues; only the key scan itself can throw.
   */
  async deleteAllForPrincipal(principalId: string): Promise<number> {
    const prefix = `user:${principalId}:sessions:`;
    const pointers = await this.cache.keys(`${prefix}*`);

    let deleted = 0;
    for (const pointer of pointers) {
      const sessionId = pointer.slice(prefix.length);
      try {
        await this.delete(sessionId);
        await this.cache.del(pointer);
        deleted++;
      } catch (err) {
        this.logger.warn('session.delete_failed', { sessionId, principalId, err: errorMeta(err) });
      }
    }

    return deleted;
  }

  /**
   * Extends a session: expiresAt = now + ttl, primary and pointer TTLs reset.
   */
  async refresh(sessionId: string, ttlSeconds: number = this.defaultTtlSeconds): Promise<SessionRecord> {
    const existing = await this.get(sessionId);
    if (!existing) throw new SessionNotFoundError(sessionId);

    const updated: SessionRecord = {
      ...existing,
      expiresAt: new Date(Date.now() + ttlSeconds * 1000).toISOString(),
    };

    await this.cache.set(this.key(sessionId), JSON.stringify(updated), { ttlSeconds });

    try {
      await this.cache.expire(this.pointerKey(existing.principalId, sessionId), ttlSeconds);
    } catch (err) {
      this.logger.warn('session.pointer_expire_failed', {
        sessionId,
        principalId: existing.principalId,
        err: errorMeta(err),
      });
    }

    return updated;
  }
}
