/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - The only component that talks to the principal and credential stores.
 * - Composes password hasher, token issuer, account guard and session store into
 *   register / login / refresh / password reset / email verification / logout.
 *
 * RULES:
 * - Every public operation returns a typed result or throws AppError.
 *   Domain errors from below (StoreError, TokenSigningError) are mapped here, once.
 * - Every operation accepts an optional AbortSignal, checked between steps.
 * - Never store/log raw passwords or tokens. Emails are logged as their domain only.
 *
 * STRUCTURE:
 * - register/login/refresh/password reset live in flows/ (deep modules).
 * - The short operations stay inline.
 */

import { StoreError } from '../../shared/db/store-error';
import { errorMeta } from '../../shared/logger/logger';
import {
  InvalidTokenError,
  TokenSigningError,
  type TokenClaims,
} from '../../shared/security/token-issuer';
import { SessionNotFoundError, type SessionRecord } from '../../shared/session/session.types';

import type { AuthDeps } from './auth.deps';
import { AuthErrors } from './auth.errors';
import type {
  LoginResult,
  OperationOptions,
  PublicUser,
  TokenPairResult,
} from './auth.types';
import { toPublicUser } from './helpers/to-public-user';

import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';
import { executeRefreshFlow } from './flows/refresh/execute-refresh-flow';
import { requestPasswordResetFlow } from './flows/password-reset/request-password-reset-flow';
import {
  resetPasswordFlow,
  type ResetPasswordParams,
} from './flows/password-reset/reset-password-flow';

export type { LoginParams, RegisterParams, ResetPasswordParams };

export class AuthService {
  constructor(private readonly deps: AuthDeps) {}

  /**
   * Maps infrastructure failures to a generic 500 and logs the cause.
   * AppErrors and aborts pass through untouched.
   */
  private async run<T>(flow: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreError || err instanceof TokenSigningError) {
        this.deps.logger.error({
          msg: 'auth.dependency_failed',
          flow,
          op: err instanceof StoreError ? err.op : 'token.sign',
          err: errorMeta(err),
        });
        throw AuthErrors.unavailable({ flow });
      }
      throw err;
    }
  }

  // ── Register ────────────────────────────────────────────────

  register(params: RegisterParams, opts: OperationOptions = {}): Promise<PublicUser> {
    return this.run('auth.register', () => executeRegisterFlow(this.deps, params, opts));
  }

  // ── Login / refresh ─────────────────────────────────────────

  login(params: LoginParams, opts: OperationOptions = {}): Promise<LoginResult> {
    return this.run('auth.login', () => executeLoginFlow(this.deps, params, opts));
  }

  refresh(refreshToken: string, opts: OperationOptions = {}): Promise<TokenPairResult> {
    return this.run('auth.refresh', () => executeRefreshFlow(this.deps, refreshToken, opts));
  }

  // ── Password reset ──────────────────────────────────────────

  /**
   * Resolves the same way whether or not the email is registered.
   */
  generateResetToken(email: string, opts: OperationOptions = {}): Promise<void> {
    return this.run('auth.forgot-password', () =>
      requestPasswordResetFlow(this.deps, { email }, opts),
    );
  }

  resetPassword(params: ResetPasswordParams, opts: OperationOptions = {}): Promise<void> {
    return this.run('auth.reset-password', () => resetPasswordFlow(this.deps, params, opts));
  }

  // ── Email verification ──────────────────────────────────────

  verifyEmail(token: string, opts: OperationOptions = {}): Promise<void> {
    return this.run('auth.verify-email', async () => {
      const credential = await this.deps.credentialStore.getByVerificationToken(
        this.deps.tokenHasher.hash(token),
      );
      if (!credential) throw AuthErrors.verificationTokenInvalid();

      opts.signal?.throwIfAborted();

      await this.deps.credentialStore.verifyEmail(credential.userId);

      this.deps.logger.info({
        msg: 'auth.verify_email.success',
        flow: 'auth.verify-email',
        userId: credential.userId,
      });
    });
  }

  isEmailVerified(principalId: string, opts: OperationOptions = {}): Promise<boolean> {
    return this.run('auth.is-email-verified', async () => {
      opts.signal?.throwIfAborted();
      const credential = await this.deps.credentialStore.getCredentialByPrincipalId(principalId);
      if (!credential) throw AuthErrors.userNotFound();
      return credential.emailVerified;
    });
  }

  // ── Logout ──────────────────────────────────────────────────

  /**
   * Revokes the refresh token (every outstanding refresh token becomes useless)
   * and deletes all sessions. Session cleanup is best effort.
   */
  logout(principalId: string, opts: OperationOptions = {}): Promise<void> {
    return this.run('auth.logout', async () => {
      opts.signal?.throwIfAborted();
      await this.deps.credentialStore.invalidateRefreshToken(principalId);

      try {
        await this.deps.sessionStore.deleteAllForPrincipal(principalId);
      } catch (err) {
        this.deps.logger.error({
          msg: 'auth.logout.session_sweep_failed',
          flow: 'auth.logout',
          userId: principalId,
          err: errorMeta(err),
        });
      }

      this.deps.logger.info({ msg: 'auth.logout.success', flow: 'auth.logout', userId: principalId });
    });
  }

  // ── Access token / session ──────────────────────────────────

  /**
   * Signature, time bounds and kind must hold, and the principal must still exist:
   * deleting a principal invalidates its tokens immediately.
   */
  validateAccessToken(token: string, opts: OperationOptions = {}): Promise<TokenClaims> {
    return this.run('auth.validate-access-token', async () => {
      let claims: TokenClaims;
      try {
        claims = this.deps.tokenIssuer.verify(token);
      } catch (err) {
        if (err instanceof InvalidTokenError) throw AuthErrors.invalidToken();
        throw err;
      }

      if (claims.kind !== 'access') throw AuthErrors.invalidToken();

      opts.signal?.throwIfAborted();

      const user = await this.deps.userStore.getUserById(claims.userId);
      if (!user) throw AuthErrors.invalidToken();

      return claims;
    });
  }

  getCurrentUser(
    principalId: string,
    opts: OperationOptions = {},
  ): Promise<{ user: PublicUser; emailVerified: boolean }> {
    return this.run('auth.me', async () => {
      const user = await this.deps.userStore.getUserById(principalId);
      if (!user) throw AuthErrors.userNotFound();

      opts.signal?.throwIfAborted();

      const credential = await this.deps.credentialStore.getCredentialByPrincipalId(principalId);
      return { user: toPublicUser(user), emailVerified: credential?.emailVerified ?? false };
    });
  }

  /**
   * Extends one of the caller's own sessions. Someone else's session id is a 404,
   * indistinguishable from an unknown one.
   */
  refreshSession(
    principalId: string,
    sessionId: string,
    opts: OperationOptions = {},
  ): Promise<SessionRecord> {
    return this.run('auth.session-refresh', async () => {
      const session = await this.deps.sessionStore.get(sessionId);
      if (!session || session.principalId !== principalId) {
        throw AuthErrors.sessionNotFound();
      }

      opts.signal?.throwIfAborted();

      try {
        return await this.deps.sessionStore.refresh(sessionId, this.deps.config.sessionTtlSeconds);
      } catch (err) {
        if (err instanceof SessionNotFoundError) throw AuthErrors.sessionNotFound();
        throw err;
      }
    });
  }
}
