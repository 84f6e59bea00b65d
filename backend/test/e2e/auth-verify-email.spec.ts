import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { buildTestApp, TEST_USER, type TestApp } from '../helpers/build-test-app';
import { ErrorResponseSchema, LoginResponseSchema } from '../helpers/http-schemas';
import { takeNotification } from '../helpers/notifications';

/**
 * E2E tests for POST /auth/verify-email.
 */
describe('POST /auth/verify-email', () => {
  let t: TestApp;
  let verificationToken: string;

  beforeEach(async () => {
    t = await buildTestApp();
    await t.app.inject({ method: 'POST', url: '/auth/register', payload: TEST_USER });
    verificationToken = takeNotification(t.notifications, 'auth.verify-email').data.verificationToken;
  });

  afterEach(async () => {
    await t.close();
  });

  it('marks the email verified, visible on /auth/me', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/auth/verify-email',
      payload: { token: verificationToken },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ message: 'Email verified.' });

    const login = LoginResponseSchema.parse(
      (
        await t.app.inject({
          method: 'POST',
          url: '/auth/login',
          payload: { email: TEST_USER.email, password: TEST_USER.password },
        })
      ).json(),
    );

    const me = await t.app.inject({
      method: 'GET',
      url: '/auth/me',
      headers: { authorization: `Bearer ${login.accessToken}` },
    });
    expect(z.object({ emailVerified: z.boolean() }).parse(me.json()).emailVerified).toBe(true);
  });

  it('returns 400 for an already-used token', async () => {
    await t.app.inject({
      method: 'POST',
      url: '/auth/verify-email',
      payload: { token: verificationToken },
    });

    const res = await t.app.inject({
      method: 'POST',
      url: '/auth/verify-email',
      payload: { token: verificationToken },
    });

    expect(res.statusCode).toBe(400);
    expect(ErrorResponseSchema.parse(res.json()).error.message).toBe(
      'This verification link is invalid or has already been used.',
    );
  });
});
