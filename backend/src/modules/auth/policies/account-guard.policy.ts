/**
 * backend/src/modules/auth/policies/account-guard.policy.ts
 *
 * WHY:
 * - Pure lockout state machine: Open -> Locked -> Open.
 * - Keeps orchestration (login flow) separate from policy (rules).
 *   The flow performs the store writes this policy decides on.
 *
 * RULES:
 * - lockedUntil = null is Open (never "locked forever").
 * - While now < lockedUntil every login attempt is rejected BEFORE the password is checked,
 *   so attempts cannot be inflated while locked.
 * - A failed attempt whose post-increment count reaches the threshold locks the account
 *   for lockDurationSeconds.
 * - A lock whose time has passed is "lapsed": treated as Open, but the stale counter
 *   must be cleared before counting the next failure (fresh threshold).
 * - Successful login clears everything (the flow calls updateLastLogin).
 */

import { AuthErrors } from '../auth.errors';
import type { Credential } from '../auth.types';

export type LockoutPolicy = Readonly<{
  threshold: number;
  lockDurationSeconds: number;
}>;

export const DEFAULT_LOCKOUT_POLICY: LockoutPolicy = {
  threshold: 5,
  lockDurationSeconds: 15 * 60,
};

export type AccountStatus =
  | { state: 'open' }
  | { state: 'locked'; lockedUntil: Date }
  | { state: 'lapsed'; lockedUntil: Date };

export type FailedAttemptDecision = { locked: false } | { locked: true; lockedUntil: Date };

export class AccountGuard {
  constructor(private readonly policy: LockoutPolicy = DEFAULT_LOCKOUT_POLICY) {}

  status(credential: Pick<Credential, 'lockedUntil'>, now: Date): AccountStatus {
    const { lockedUntil } = credential;
    if (!lockedUntil) return { state: 'open' };

    return now.getTime() < lockedUntil.getTime()
      ? { state: 'locked', lockedUntil }
      : { state: 'lapsed', lockedUntil };
  }

  assertOpen(credential: Pick<Credential, 'lockedUntil'>, now: Date): void {
    const status = this.status(credential, now);
    if (status.state === 'locked') {
      throw AuthErrors.accountLocked({ lockedUntil: status.lockedUntil.toISOString() });
    }
  }

  onFailedAttempt(attemptsAfterIncrement: number, now: Date): FailedAttemptDecision {
    if (attemptsAfterIncrement < this.policy.threshold) return { locked: false };

    return {
      locked: true,
      lockedUntil: new Date(now.getTime() + this.policy.lockDurationSeconds * 1000),
    };
  }
}
