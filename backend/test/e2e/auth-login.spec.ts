import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import {
  buildTestApp,
  registerViaApi,
  TEST_USER,
  type TestApp,
} from '../helpers/build-test-app';
import {
  ErrorResponseSchema,
  LoginResponseSchema,
  MessageResponseSchema,
  PublicUserSchema,
  TokenPairResponseSchema,
} from '../helpers/http-schemas';

/**
 * E2E tests for the signed-in lifecycle:
 * POST /auth/login -> GET /auth/me -> POST /auth/refresh -> POST /auth/logout
 */

const MeResponseSchema = z.object({ user: PublicUserSchema, emailVerified: z.boolean() });

const SessionResponseSchema = z.object({
  session: z.object({ id: z.string(), createdAt: z.string(), expiresAt: z.string() }),
});

describe('auth session lifecycle (E2E)', () => {
  let t: TestApp;

  async function login(password: string = TEST_USER.password) {
    return t.app.inject({
      method: 'POST',
      url: '/auth/login',
      headers: { 'user-agent': 'e2e-agent' },
      payload: { email: TEST_USER.email, password },
    });
  }

  beforeEach(async () => {
    t = await buildTestApp();
    await registerViaApi(t);
  });

  afterEach(async () => {
    await t.close();
  });

  describe('POST /auth/login', () => {
    it('returns tokens, session id and the public user', async () => {
      const res = await login();

      expect(res.statusCode).toBe(200);
      const body = LoginResponseSchema.parse(res.json());
      expect(body.user.email).toBe('alice@example.com');
      expect(body.sessionId).toMatch(/^[0-9a-f]{64}$/);

      const session = await t.deps.sessionStore.get(body.sessionId);
      expect(session?.userAgent).toBe('e2e-agent');
      expect(session?.ip).toBe('127.0.0.1');
    });

    it('returns 401 with the uniform message for a wrong password', async () => {
      const res = await login('Wrong-horse1');

      expect(res.statusCode).toBe(401);
      expect(ErrorResponseSchema.parse(res.json())).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Invalid email or password.' },
      });
    });

    it('returns 403 once the account is locked', async () => {
      for (let i = 0; i < 5; i++) {
        expect((await login('Wrong-horse1')).statusCode).toBe(401);
      }

      const res = await login();
      expect(res.statusCode).toBe(403);
      expect(ErrorResponseSchema.parse(res.json()).error.code).toBe('FORBIDDEN');
    });
  });

  describe('GET /auth/me', () => {
    it('returns the caller for a valid bearer token', async () => {
      const { accessToken } = LoginResponseSchema.parse((await login()).json());

      const res = await t.app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: { authorization: `Bearer ${accessToken}` },
      });

      expect(res.statusCode).toBe(200);
      const body = MeResponseSchema.parse(res.json());
      expect(body.user.username).toBe('alice');
      expect(body.emailVerified).toBe(false);
    });

    it('returns 401 without a token', async () => {
      const res = await t.app.inject({ method: 'GET', url: '/auth/me' });

      expect(res.statusCode).toBe(401);
      expect(ErrorResponseSchema.parse(res.json())).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
    });

    it('returns 401 when presented a refresh token as bearer', async () => {
      const { refreshToken } = LoginResponseSchema.parse((await login()).json());

      const res = await t.app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: { authorization: `Bearer ${refreshToken}` },
      });

      expect(res.statusCode).toBe(401);
    });
  });

  describe('POST /auth/refresh', () => {
    it('rotates the pair and rejects the previous refresh token', async () => {
      const first = LoginResponseSchema.parse((await login()).json());

      const rotated = await t.app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: first.refreshToken },
      });
      expect(rotated.statusCode).toBe(200);
      const second = TokenPairResponseSchema.parse(rotated.json());
      expect(second.refreshToken).not.toBe(first.refreshToken);

      const replay = await t.app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: first.refreshToken },
      });
      expect(replay.statusCode).toBe(401);
      expect(ErrorResponseSchema.parse(replay.json()).error.message).toBe(
        'Invalid or expired token.',
      );
    });
  });

  describe('POST /auth/session/refresh', () => {
    it("extends the caller's session", async () => {
      const { accessToken, sessionId } = LoginResponseSchema.parse((await login()).json());

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/session/refresh',
        headers: { authorization: `Bearer ${accessToken}` },
        payload: { sessionId },
      });

      expect(res.statusCode).toBe(200);
      expect(SessionResponseSchema.parse(res.json()).session.id).toBe(sessionId);
    });

    it('returns 404 for an unknown session id', async () => {
      const { accessToken } = LoginResponseSchema.parse((await login()).json());

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/session/refresh',
        headers: { authorization: `Bearer ${accessToken}` },
        payload: { sessionId: 'f'.repeat(64) },
      });

      expect(res.statusCode).toBe(404);
      expect(ErrorResponseSchema.parse(res.json()).error.message).toBe('Session not found.');
    });
  });

  describe('POST /auth/logout', () => {
    it('revokes refresh and deletes sessions', async () => {
      const { accessToken, refreshToken, sessionId } = LoginResponseSchema.parse(
        (await login()).json(),
      );

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/logout',
        headers: { authorization: `Bearer ${accessToken}` },
      });

      expect(res.statusCode).toBe(200);
      expect(MessageResponseSchema.parse(res.json())).toEqual({ message: 'Logged out.' });

      expect(await t.deps.sessionStore.get(sessionId)).toBeNull();

      const refresh = await t.app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken },
      });
      expect(refresh.statusCode).toBe(401);
    });

    it('requires authentication', async () => {
      const res = await t.app.inject({ method: 'POST', url: '/auth/logout' });
      expect(res.statusCode).toBe(401);
    });
  });
});
