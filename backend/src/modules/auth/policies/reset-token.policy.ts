/**
 * backend/src/modules/auth/policies/reset-token.policy.ts
 *
 * WHY:
 * - Pure decision: may this presented reset token be consumed?
 *
 * RULES:
 * - No pending token -> unusable.
 * - Hash mismatch -> unusable (comparison is constant-time, done by TokenHasher).
 * - now >= expiresAt -> unusable.
 * - The three cases share one outward error; `reason` is for logs only.
 */

import type { TokenHasher } from '../../../shared/security/token-hasher';
import type { PendingResetToken } from '../auth.types';

export type ResetTokenCheck =
  | { usable: true }
  | { usable: false; reason: 'no_pending_token' | 'token_mismatch' | 'token_expired' };

export function checkResetToken(input: {
  pending: PendingResetToken | null;
  presentedToken: string;
  tokenHasher: TokenHasher;
  now: Date;
}): ResetTokenCheck {
  if (!input.pending) return { usable: false, reason: 'no_pending_token' };

  if (!input.tokenHasher.matches(input.presentedToken, input.pending.tokenHash)) {
    return { usable: false, reason: 'token_mismatch' };
  }

  if (input.now.getTime() >= input.pending.expiresAt.getTime()) {
    return { usable: false, reason: 'token_expired' };
  }

  return { usable: true };
}
