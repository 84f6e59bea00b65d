import { describe, it, expect, beforeEach } from 'vitest';
import {
  ALICE,
  LOGIN_CONTEXT,
  buildAuthService,
  registerUser,
  type AuthServiceHarness,
} from '../../helpers/build-auth-service';

const INVALID_TOKEN = {
  code: 'UNAUTHORIZED',
  status: 401,
  message: 'Invalid or expired token.',
};

describe('AuthService tokens and sessions', () => {
  let h: AuthServiceHarness;
  let userId: string;

  const login = () =>
    h.authService.login({ email: ALICE.email, password: ALICE.password, ...LOGIN_CONTEXT });

  beforeEach(async () => {
    h = buildAuthService();
    userId = (await registerUser(h)).user.id;
  });

  describe('refresh', () => {
    it('rotates the refresh token: the new one works, the old one is dead', async () => {
      const first = await login();

      const second = await h.authService.refresh(first.refreshToken);
      expect(second.user.id).toBe(userId);
      expect(second.refreshToken).not.toBe(first.refreshToken);
      expect(h.credentialStore.credentials.get(userId)?.refreshTokenHash).toBe(
        h.tokenHasher.hash(second.refreshToken),
      );

      await expect(h.authService.refresh(first.refreshToken)).rejects.toMatchObject(INVALID_TOKEN);
      await expect(h.authService.refresh(second.refreshToken)).resolves.toMatchObject({
        user: { id: userId },
      });
    });

    it('rejects an access token', async () => {
      const { accessToken } = await login();

      await expect(h.authService.refresh(accessToken)).rejects.toMatchObject(INVALID_TOKEN);
    });

    it('rejects garbage', async () => {
      await expect(h.authService.refresh('not-a-jwt')).rejects.toMatchObject(INVALID_TOKEN);
    });

    it('rejects the token of a deleted principal', async () => {
      const { refreshToken } = await login();
      await h.userStore.deleteUser(userId);

      await expect(h.authService.refresh(refreshToken)).rejects.toMatchObject(INVALID_TOKEN);
    });
  });

  describe('validateAccessToken', () => {
    it('returns the claims of a live access token', async () => {
      const { accessToken } = await login();

      const claims = await h.authService.validateAccessToken(accessToken);
      expect(claims).toMatchObject({
        userId,
        username: 'alice',
        email: 'alice@example.com',
        isAdmin: false,
        isPremium: false,
        kind: 'access',
      });
    });

    it('rejects a refresh token', async () => {
      const { refreshToken } = await login();

      await expect(h.authService.validateAccessToken(refreshToken)).rejects.toMatchObject(
        INVALID_TOKEN,
      );
    });

    it('rejects the token once the principal is deleted', async () => {
      const { accessToken } = await login();
      await h.userStore.deleteUser(userId);

      await expect(h.authService.validateAccessToken(accessToken)).rejects.toMatchObject(
        INVALID_TOKEN,
      );
    });
  });

  describe('logout', () => {
    it('revokes the refresh token and deletes every session', async () => {
      const a = await login();
      const b = await login();

      await h.authService.logout(userId);

      expect(h.credentialStore.credentials.get(userId)?.refreshTokenHash).toBeNull();
      await expect(h.authService.refresh(b.refreshToken)).rejects.toMatchObject(INVALID_TOKEN);
      expect(await h.sessionStore.get(a.sessionId)).toBeNull();
      expect(await h.sessionStore.get(b.sessionId)).toBeNull();
    });

    it('is idempotent', async () => {
      await h.authService.logout(userId);
      await expect(h.authService.logout(userId)).resolves.toBeUndefined();
    });
  });

  describe('getCurrentUser', () => {
    it('returns the public user and the verification state', async () => {
      const me = await h.authService.getCurrentUser(userId);

      expect(me.user).toMatchObject({ id: userId, username: 'alice' });
      expect(me.emailVerified).toBe(false);
    });

    it('is 404 for an unknown principal', async () => {
      await expect(h.authService.getCurrentUser('missing')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'User not found.',
      });
    });
  });

  describe('refreshSession', () => {
    it("extends the caller's own session", async () => {
      const { sessionId } = await login();

      const session = await h.authService.refreshSession(userId, sessionId);
      expect(session.id).toBe(sessionId);
      expect(session.principalId).toBe(userId);
    });

    it("hides another principal's session behind a 404", async () => {
      const { sessionId } = await login();
      const bob = await registerUser(h, {
        username: 'bob',
        email: 'bob@example.com',
        password: 'Battery-staple2',
      });

      await expect(h.authService.refreshSession(bob.user.id, sessionId)).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Session not found.',
      });
    });
  });
});
