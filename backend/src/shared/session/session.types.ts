/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Shapes shared by SessionStore and its callers.
 *
 * KEYS:
 * - session:{sessionId}                      -> JSON SessionRecord (primary)
 * - user:{principalId}:sessions:{sessionId}  -> pointer, same TTL as the primary
 */

import { z } from 'zod';

export const SESSION_KEY_PREFIX = 'session';

export const DEFAULT_SESSION_TTL_SECONDS = 24 * 60 * 60;

export type SessionRecord = {
  id: string;
  principalId: string;
  userAgent: string;
  ip: string;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601, always createdAt (or last refresh) + ttl */
  expiresAt: string;
};

export const SessionRecordSchema = z.object({
  id: z.string().min(1),
  principalId: z.string().min(1),
  userAgent: z.string(),
  ip: z.string(),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
});

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super('Session not found');
    this.name = 'SessionNotFoundError';
  }
}
