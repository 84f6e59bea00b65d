/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Login is where the account guard, password hasher, token issuer and session store meet.
 *
 * ORDER (LOCKED):
 * 1) principal by email      -> missing: Unauthorized (uniform)
 * 2) credential               -> missing: Unauthorized (uniform)
 * 3) account guard            -> locked: Forbidden, BEFORE the password is looked at
 * 4) password verify          -> mismatch: failed-attempt path, then Unauthorized (uniform)
 * 5) success                  -> last login + counters reset, token pair + refresh hash, session
 *
 * FAILED-ATTEMPT PATH:
 * - lapsed lock -> clear the stale counter first (fresh threshold)
 * - increment (post-increment count) -> guard decides -> persist lock + notify
 *
 * RULES:
 * - No HTTP concerns here.
 * - Never log the password or any token.
 */

import { errorMeta } from '../../../../shared/logger/logger';
import {
  PasswordMismatchError,
  PasswordVerificationError,
} from '../../../../shared/security/password-hasher';

import type { User } from '../../../users';
import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import { NOTIFICATION_SUBJECTS } from '../../auth.constants';
import type { Credential, LoginResult, OperationOptions } from '../../auth.types';
import { emailDomain, normalizeEmail } from '../../helpers/email';
import { issueTokenPair } from '../../helpers/issue-token-pair';
import { sendNotification } from '../../helpers/send-notification';

export type LoginParams = {
  email: string;
  password: string;
  ip: string;
  userAgent: string;
};

type LoginDeps = Pick<
  AuthDeps,
  | 'userStore'
  | 'credentialStore'
  | 'passwordHasher'
  | 'tokenHasher'
  | 'tokenIssuer'
  | 'sessionStore'
  | 'accountGuard'
  | 'notificationSender'
  | 'logger'
  | 'config'
>;

async function recordFailedAttempt(
  deps: LoginDeps,
  user: User,
  credential: Credential,
  now: Date,
): Promise<void> {
  if (deps.accountGuard.status(credential, now).state === 'lapsed') {
    await deps.credentialStore.clearLockout(user.id);
  }

  const attempts = await deps.credentialStore.incrementFailedAttempts(user.id);
  const decision = deps.accountGuard.onFailedAttempt(attempts, now);

  deps.logger.warn({
    msg: 'auth.login.failed',
    flow: 'auth.login',
    userId: user.id,
    reason: 'wrong_password',
    attempts,
  });

  if (!decision.locked) return;

  await deps.credentialStore.setLockout(user.id, decision.lockedUntil);

  deps.logger.warn({
    msg: 'auth.login.locked',
    flow: 'auth.login',
    userId: user.id,
    lockedUntil: decision.lockedUntil.toISOString(),
  });

  await sendNotification(
    deps,
    {
      to: [user.email],
      subject: NOTIFICATION_SUBJECTS.accountLocked,
      template: 'auth.account-locked',
      data: { username: user.username, lockedUntil: decision.lockedUntil.toISOString() },
    },
    { flow: 'auth.login', userId: user.id },
  );
}

export async function executeLoginFlow(
  deps: LoginDeps,
  params: LoginParams,
  opts: OperationOptions = {},
): Promise<LoginResult> {
  const email = normalizeEmail(params.email);

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    emailDomain: emailDomain(email),
  });

  const user = await deps.userStore.getUserByEmail(email);
  if (!user) {
    deps.logger.warn({ msg: 'auth.login.failed', flow: 'auth.login', reason: 'user_not_found' });
    throw AuthErrors.invalidCredentials();
  }

  const credential = await deps.credentialStore.getCredentialByPrincipalId(user.id);
  if (!credential) {
    deps.logger.warn({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      userId: user.id,
      reason: 'credential_missing',
    });
    throw AuthErrors.invalidCredentials();
  }

  const now = new Date();
  deps.accountGuard.assertOpen(credential, now);

  opts.signal?.throwIfAborted();

  try {
    await deps.passwordHasher.verify(params.password, credential.passwordHash, credential.passwordSalt);
  } catch (err) {
    if (err instanceof PasswordMismatchError) {
      await recordFailedAttempt(deps, user, credential, now);
      throw AuthErrors.invalidCredentials();
    }

    if (err instanceof PasswordVerificationError) {
      deps.logger.error({
        msg: 'auth.login.hash_unusable',
        flow: 'auth.login',
        userId: user.id,
        err: errorMeta(err),
      });
      throw AuthErrors.unavailable({ userId: user.id, reason: 'password_hash_unusable' });
    }

    throw err;
  }

  opts.signal?.throwIfAborted();

  await deps.credentialStore.updateLastLogin(user.id, now);

  // Tokens first: a failed refresh-token write must not leave a session behind.
  const tokens = await issueTokenPair(deps, user);

  const session = await deps.sessionStore.create(
    user.id,
    params.userAgent,
    params.ip,
    deps.config.sessionTtlSeconds,
  );

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    userId: user.id,
  });

  return { ...tokens, sessionId: session.id };
}
