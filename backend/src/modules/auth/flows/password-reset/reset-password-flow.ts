/**
 * backend/src/modules/auth/flows/password-reset/reset-password-flow.ts
 *
 * WHY:
 * - Deep module for consuming a password reset token and setting a new password.
 *
 * RULES:
 * - Input checks first: confirmation mismatch and policy failures are 400s.
 * - Unknown email -> 404. Token absent/mismatched/expired -> one 401.
 * - Token is one-time use: the password update, token clear, lockout clear and
 *   refresh revocation commit in one credential-store transaction.
 * - After a reset the old world is gone: lockout cleared, refresh token revoked,
 *   every session deleted (best effort), and the owner is told.
 * - No auto-login after reset; the user must sign in with the new password.
 */

import { errorMeta } from '../../../../shared/logger/logger';

import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import { NOTIFICATION_SUBJECTS } from '../../auth.constants';
import type { OperationOptions } from '../../auth.types';
import { checkPasswordPolicy } from '../../helpers/check-password-policy';
import { normalizeEmail } from '../../helpers/email';
import { sendNotification } from '../../helpers/send-notification';
import { checkResetToken } from '../../policies/reset-token.policy';

export type ResetPasswordParams = {
  token: string;
  email: string;
  newPassword: string;
  confirmPassword: string;
};

export async function resetPasswordFlow(
  deps: Pick<
    AuthDeps,
    | 'userStore'
    | 'credentialStore'
    | 'passwordHasher'
    | 'tokenHasher'
    | 'sessionStore'
    | 'notificationSender'
    | 'logger'
    | 'config'
  >,
  params: ResetPasswordParams,
  opts: OperationOptions = {},
): Promise<void> {
  if (params.newPassword !== params.confirmPassword) {
    throw AuthErrors.passwordsDoNotMatch();
  }
  checkPasswordPolicy(params.newPassword, deps.config.passwordPolicy);

  const user = await deps.userStore.getUserByEmail(normalizeEmail(params.email));
  if (!user) throw AuthErrors.userNotFound();

  const credential = await deps.credentialStore.getCredentialByPrincipalId(user.id);

  const check = checkResetToken({
    pending: credential?.resetToken ?? null,
    presentedToken: params.token,
    tokenHasher: deps.tokenHasher,
    now: new Date(),
  });

  if (!credential || !check.usable) {
    deps.logger.warn({
      msg: 'auth.reset_password.rejected',
      flow: 'auth.reset-password',
      userId: user.id,
      reason: check.usable ? 'credential_missing' : check.reason,
    });
    throw AuthErrors.resetTokenInvalid();
  }

  opts.signal?.throwIfAborted();

  const { hash, salt } = await deps.passwordHasher.hash(params.newPassword);

  await deps.credentialStore.transaction(async (store) => {
    await store.updatePasswordHash(user.id, hash, salt);
    await store.clearResetToken(user.id);
    await store.clearLockout(user.id);
    await store.invalidateRefreshToken(user.id);
  });

  try {
    await deps.sessionStore.deleteAllForPrincipal(user.id);
  } catch (err) {
    deps.logger.error({
      msg: 'auth.reset_password.session_sweep_failed',
      flow: 'auth.reset-password',
      userId: user.id,
      err: errorMeta(err),
    });
  }

  await sendNotification(
    deps,
    {
      to: [user.email],
      subject: NOTIFICATION_SUBJECTS.passwordChanged,
      template: 'auth.password-changed',
      data: { username: user.username },
    },
    { flow: 'auth.reset-password', userId: user.id },
  );

  deps.logger.info({
    msg: 'auth.reset_password.completed',
    flow: 'auth.reset-password',
    userId: user.id,
  });
}
