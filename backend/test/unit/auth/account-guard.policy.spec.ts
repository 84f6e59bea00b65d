import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import { AccountGuard } from '../../../src/modules/auth/policies/account-guard.policy';

const NOW = new Date('2026-01-01T12:00:00Z');

describe('AccountGuard', () => {
  const guard = new AccountGuard({ threshold: 5, lockDurationSeconds: 900 });

  describe('status', () => {
    it('is open without a lock', () => {
      expect(guard.status({ lockedUntil: null }, NOW)).toEqual({ state: 'open' });
    });

    it('is locked while now is before lockedUntil', () => {
      const lockedUntil = new Date('2026-01-01T12:00:01Z');
      expect(guard.status({ lockedUntil }, NOW)).toEqual({ state: 'locked', lockedUntil });
    });

    it('is lapsed once lockedUntil is reached', () => {
      const lockedUntil = new Date('2026-01-01T12:00:00Z');
      expect(guard.status({ lockedUntil }, NOW)).toEqual({ state: 'lapsed', lockedUntil });
    });
  });

  describe('assertOpen', () => {
    it('throws 403 while locked', () => {
      const lockedUntil = new Date('2026-01-01T12:10:00Z');

      try {
        guard.assertOpen({ lockedUntil }, NOW);
        expect.unreachable('should have thrown');
      } catch (err) {
        expect(AppError.is(err, 'FORBIDDEN')).toBe(true);
        if (!AppError.is(err)) return;
        expect(err.status).toBe(403);
        expect(err.message).toBe('Account is temporarily locked. Please try again later.');
        expect(err.meta).toEqual({ lockedUntil: '2026-01-01T12:10:00.000Z' });
      }
    });

    it('does not throw for open or lapsed accounts', () => {
      expect(() => guard.assertOpen({ lockedUntil: null }, NOW)).not.toThrow();
      expect(() => guard.assertOpen({ lockedUntil: new Date('2026-01-01T11:00:00Z') }, NOW)).not.toThrow();
    });
  });

  describe('onFailedAttempt', () => {
    it('stays open below the threshold', () => {
      expect(guard.onFailedAttempt(4, NOW)).toEqual({ locked: false });
    });

    it('locks for the configured duration when the threshold is reached', () => {
      expect(guard.onFailedAttempt(5, NOW)).toEqual({
        locked: true,
        lockedUntil: new Date('2026-01-01T12:15:00Z'),
      });
    });

    it('keeps locking past the threshold', () => {
      expect(guard.onFailedAttempt(7, NOW).locked).toBe(true);
    });
  });
});
