import { describe, it, expect } from 'vitest';
import { checkResetToken } from '../../../src/modules/auth/policies/reset-token.policy';
import { Sha256TokenHasher } from '../../../src/shared/security/sha256-token-hasher';

const tokenHasher = new Sha256TokenHasher();
const NOW = new Date('2026-01-01T12:00:00Z');
const RAW = 'reset-token-placeholder-0001';

const pending = {
  tokenHash: tokenHasher.hash(RAW),
  expiresAt: new Date('2026-01-01T13:00:00Z'),
};

describe('checkResetToken', () => {
  it('accepts the matching, unexpired token', () => {
    expect(checkResetToken({ pending, presentedToken: RAW, tokenHasher, now: NOW })).toEqual({
      usable: true,
    });
  });

  it('rejects when no token is pending', () => {
    expect(checkResetToken({ pending: null, presentedToken: RAW, tokenHasher, now: NOW })).toEqual({
      usable: false,
      reason: 'no_pending_token',
    });
  });

  it('rejects a different token', () => {
    expect(
      checkResetToken({ pending, presentedToken: `${RAW}x`, tokenHasher, now: NOW }),
    ).toEqual({ usable: false, reason: 'token_mismatch' });
  });

  it('rejects at the exact expiry instant', () => {
    expect(
      checkResetToken({ pending, presentedToken: RAW, tokenHasher, now: pending.expiresAt }),
    ).toEqual({ usable: false, reason: 'token_expired' });
  });
});
