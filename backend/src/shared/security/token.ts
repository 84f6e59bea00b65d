/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Opaque tokens (reset, email verification, session ids) come from one place.
 *
 * HOW TO USE:
 * - generateSecureToken()       -> URL-safe, 43 chars (32 bytes)
 * - generateSecureToken(48)     -> URL-safe, 64 chars (password reset)
 * - generateHexId(32)           -> 64 hex chars (session ids)
 * - Send the token to the user, store only its hash.
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}

export function generateHexId(bytes: number = 32): string {
  return randomBytes(bytes).toString('hex');
}
