/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin while isolating orchestration complexity.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Email is lowercased before any lookup or write.
 * - Principal and credential live in separate stores. If the credential write fails
 *   the principal is deleted again (compensating action) and Internal is raised.
 * - The verification email is best-effort; registration succeeds without it.
 */

import { StoreError } from '../../../../shared/db/store-error';
import { errorMeta } from '../../../../shared/logger/logger';
import { generateSecureToken } from '../../../../shared/security/token';

import type { User } from '../../../users';
import type { AuthDeps } from '../../auth.deps';
import { AuthErrors } from '../../auth.errors';
import { NOTIFICATION_SUBJECTS, VERIFICATION_TOKEN_BYTES } from '../../auth.constants';
import type { OperationOptions, PublicUser } from '../../auth.types';
import { checkPasswordPolicy } from '../../helpers/check-password-policy';
import { emailDomain, normalizeEmail } from '../../helpers/email';
import { sendNotification } from '../../helpers/send-notification';
import { toPublicUser } from '../../helpers/to-public-user';

export type RegisterParams = {
  username: string;
  email: string;
  password: string;
};

export async function executeRegisterFlow(
  deps: Pick<
    AuthDeps,
    | 'userStore'
    | 'credentialStore'
    | 'passwordHasher'
    | 'tokenHasher'
    | 'notificationSender'
    | 'logger'
    | 'config'
  >,
  params: RegisterParams,
  opts: OperationOptions = {},
): Promise<PublicUser> {
  const email = normalizeEmail(params.email);
  const username = params.username.trim();

  deps.logger.info({
    msg: 'auth.register.start',
    flow: 'auth.register',
    emailDomain: emailDomain(email),
  });

  checkPasswordPolicy(params.password, deps.config.passwordPolicy);

  opts.signal?.throwIfAborted();

  if (await deps.userStore.getUserByEmail(email)) {
    throw AuthErrors.emailTaken();
  }
  if (await deps.userStore.getUserByUsername(username)) {
    throw AuthErrors.usernameTaken();
  }

  opts.signal?.throwIfAborted();

  let user: User;
  try {
    user = await deps.userStore.insertUser({ username, email });
  } catch (err) {
    // Lost a race with a concurrent registration.
    if (err instanceof StoreError && err.reason === 'conflict') {
      throw AuthErrors.alreadyRegistered();
    }
    throw err;
  }

  // From here on the principal exists; no abort checks until the credential is in place.
  const verificationToken = generateSecureToken(VERIFICATION_TOKEN_BYTES);

  try {
    const { hash, salt } = await deps.passwordHasher.hash(params.password);

    await deps.credentialStore.createCredential({
      userId: user.id,
      passwordHash: hash,
      passwordSalt: salt,
      emailVerificationTokenHash: deps.tokenHasher.hash(verificationToken),
    });
  } catch (err) {
    deps.logger.error({
      msg: 'auth.register.credential_failed',
      flow: 'auth.register',
      userId: user.id,
      err: errorMeta(err),
    });

    try {
      await deps.userStore.deleteUser(user.id);
    } catch (cleanupErr) {
      deps.logger.error({
        msg: 'auth.register.compensation_failed',
        flow: 'auth.register',
        userId: user.id,
        err: errorMeta(cleanupErr),
      });
    }

    throw AuthErrors.registrationFailed({ userId: user.id });
  }

  await sendNotification(
    deps,
    {
      to: [user.email],
      subject: NOTIFICATION_SUBJECTS.verifyEmail,
      template: 'auth.verify-email',
      data: { username: user.username, verificationToken },
    },
    { flow: 'auth.register', userId: user.id },
  );

  deps.logger.info({
    msg: 'auth.register.success',
    flow: 'auth.register',
    userId: user.id,
  });

  return toPublicUser(user);
}
