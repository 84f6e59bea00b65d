/**
 * backend/src/modules/auth/flows/password-reset/request-password-reset-flow.ts
 *
 * WHY:
 * - Deep module for the "forgot password" use-case.
 * - Preserves anti-enumeration behavior.
 *
 * RULES:
 * - Always resolves void. Unknown email and missing credential are silent
 *   (no token stored, nothing sent), so callers cannot tell the cases apart.
 * - The raw token leaves only inside the notification; the store gets its hash.
 * - Issuing a new token replaces any pending one (one active at a time).
 */

import { generateSecureToken } from '../../../../shared/security/token';

import type { AuthDeps } from '../../auth.deps';
import { NOTIFICATION_SUBJECTS, RESET_TOKEN_BYTES } from '../../auth.constants';
import type { OperationOptions } from '../../auth.types';
import { emailDomain, normalizeEmail } from '../../helpers/email';
import { sendNotification } from '../../helpers/send-notification';

export async function requestPasswordResetFlow(
  deps: Pick<
    AuthDeps,
    'userStore' | 'credentialStore' | 'tokenHasher' | 'notificationSender' | 'logger' | 'config'
  >,
  params: { email: string },
  opts: OperationOptions = {},
): Promise<void> {
  const email = normalizeEmail(params.email);

  deps.logger.info({
    msg: 'auth.forgot_password.start',
    flow: 'auth.forgot-password',
    emailDomain: emailDomain(email),
  });

  const user = await deps.userStore.getUserByEmail(email);
  if (!user) {
    deps.logger.info({
      msg: 'auth.forgot_password.silent',
      flow: 'auth.forgot-password',
      reason: 'user_not_found',
    });
    return;
  }

  const credential = await deps.credentialStore.getCredentialByPrincipalId(user.id);
  if (!credential) {
    deps.logger.info({
      msg: 'auth.forgot_password.silent',
      flow: 'auth.forgot-password',
      userId: user.id,
      reason: 'credential_missing',
    });
    return;
  }

  opts.signal?.throwIfAborted();

  const resetToken = generateSecureToken(RESET_TOKEN_BYTES);
  const expiresAt = new Date(Date.now() + deps.config.resetTokenTtlSeconds * 1000);

  await deps.credentialStore.setResetToken(user.id, deps.tokenHasher.hash(resetToken), expiresAt);

  await sendNotification(
    deps,
    {
      to: [user.email],
      subject: NOTIFICATION_SUBJECTS.resetPassword,
      template: 'auth.reset-password',
      data: { username: user.username, resetToken, expiresAt: expiresAt.toISOString() },
    },
    { flow: 'auth.forgot-password', userId: user.id },
  );

  deps.logger.info({
    msg: 'auth.forgot_password.issued',
    flow: 'auth.forgot-password',
    userId: user.id,
  });
}
