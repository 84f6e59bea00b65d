import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { JwtTokenIssuer } from '../../../../src/shared/security/jwt-token-issuer';
import {
  InvalidTokenError,
  type TokenSubject,
} from '../../../../src/shared/security/token-issuer';

const SECRET = 'test-secret-test-secret-test-secret-00';
const T0 = new Date('2026-01-01T00:00:00Z');
const T0_SECONDS = 1767225600;

const subject: TokenSubject = {
  userId: 'usr_1',
  username: 'alice',
  email: 'alice@example.com',
  isAdmin: false,
  isPremium: true,
};

function b64url(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

function reason(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidTokenError) return err.reason;
    throw err;
  }
  throw new Error('expected InvalidTokenError');
}

describe('JwtTokenIssuer', () => {
  const issuer = new JwtTokenIssuer({ secret: SECRET });

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('round-trips subject, kind and time claims', () => {
    const issued = issuer.issue(subject, 'access', 900);
    const claims = issuer.verify(issued.token);

    expect(claims).toMatchObject({
      ...subject,
      kind: 'access',
      iat: T0_SECONDS,
      nbf: T0_SECONDS,
      exp: T0_SECONDS + 900,
    });
    expect(claims.jti).toMatch(/^[0-9a-f-]{36}$/);
    expect(issued.expiresAt.toISOString()).toBe('2026-01-01T00:15:00.000Z');
  });

  it('signs with HS256', () => {
    const { token } = issuer.issue(subject, 'access', 900);
    const decoded = jwt.decode(token, { complete: true });

    expect(decoded?.header.alg).toBe('HS256');
  });

  it('issues a pair whose expiresAt is the access token expiry', () => {
    const pair = issuer.issuePair(subject, 900, 3600);

    expect(pair.expiresAt.toISOString()).toBe('2026-01-01T00:15:00.000Z');
    expect(issuer.verify(pair.accessToken).kind).toBe('access');

    const refresh = issuer.verify(pair.refreshToken);
    expect(refresh.kind).toBe('refresh');
    expect(refresh.exp).toBe(T0_SECONDS + 3600);
  });

  it('gives every token a distinct jti, even within the same second', () => {
    const a = issuer.verify(issuer.issue(subject, 'refresh', 60).token);
    const b = issuer.verify(issuer.issue(subject, 'refresh', 60).token);

    expect(a.jti).not.toBe(b.jti);
  });

  it('rejects a token signed with another secret', () => {
    const other = new JwtTokenIssuer({ secret: 'another-test-secret-another-test-00' });
    const { token } = other.issue(subject, 'access', 900);

    expect(reason(() => issuer.verify(token))).toBe('invalid signature');
  });

  it('rejects a token whose payload was altered after signing', () => {
    const { token } = issuer.issue(subject, 'access', 900);
    const [header, , signature] = token.split('.');
    const escalated = {
      ...subject,
      isAdmin: true,
      kind: 'access',
      iat: T0_SECONDS,
      nbf: T0_SECONDS,
      exp: T0_SECONDS + 900,
      jti: 'forged',
    };
    const forged = `${header}.${b64url(escalated)}.${signature}`;

    expect(reason(() => issuer.verify(forged))).toBe('invalid signature');
  });

  it('rejects an expired token', () => {
    const { token } = issuer.issue(subject, 'access', 60);

    vi.setSystemTime(new Date(T0.getTime() + 61_000));

    expect(reason(() => issuer.verify(token))).toBe('jwt expired');
  });

  it('rejects a token that is not valid yet', () => {
    const { token } = issuer.issue(subject, 'access', 900);

    vi.setSystemTime(new Date(T0.getTime() - 10_000));

    expect(reason(() => issuer.verify(token))).toBe('jwt not active');
  });

  it('rejects an unsigned token (alg none)', () => {
    const payload = {
      ...subject,
      kind: 'access',
      iat: T0_SECONDS,
      nbf: T0_SECONDS,
      exp: T0_SECONDS + 900,
      jti: 'unsigned',
    };
    const unsigned = `${b64url({ alg: 'none', typ: 'JWT' })}.${b64url(payload)}.`;

    expect(() => issuer.verify(unsigned)).toThrowError(InvalidTokenError);
  });

  it('rejects a token whose header claims an asymmetric algorithm', () => {
    const { token } = issuer.issue(subject, 'access', 900);
    const [, payload, signature] = token.split('.');
    const swapped = `${b64url({ alg: 'RS256', typ: 'JWT' })}.${payload}.${signature}`;

    expect(() => issuer.verify(swapped)).toThrowError(InvalidTokenError);
  });

  it('rejects a correctly signed token without the expected claims', () => {
    const token = jwt.sign({ sub: 'usr_1' }, SECRET, { algorithm: 'HS256' });

    expect(reason(() => issuer.verify(token))).toBe('malformed claims');
  });

  it('rejects garbage', () => {
    expect(() => issuer.verify('not.a.token')).toThrowError(InvalidTokenError);
    expect(issuer.verify.bind(issuer, '')).toThrowError('Invalid token');
  });
});
