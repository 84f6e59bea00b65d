/**
 * src/modules/auth/auth.deps.ts
 *
 * WHY:
 * - AuthService and its flows share one dependency bag. Flows take a Pick<> of it
 *   so each one declares exactly what it touches.
 *
 * RULES:
 * - Interfaces only (DIP). Concrete classes are chosen in app/di.ts.
 */

import type { Logger } from '../../shared/logger/logger';
import type { NotificationSender } from '../../shared/messaging/notification-sender';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { PasswordPolicy } from '../../shared/security/password-policy';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { TokenIssuer } from '../../shared/security/token-issuer';
import type { SessionStore } from '../../shared/session/session.store';
import type { UserStore } from '../users';
import type { CredentialStore } from './credential.store';
import type { AccountGuard } from './policies/account-guard.policy';

export type AuthConfig = Readonly<{
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  sessionTtlSeconds: number;
  resetTokenTtlSeconds: number;
  passwordPolicy: PasswordPolicy;
}>;

export type AuthDeps = {
  userStore: UserStore;
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  tokenIssuer: TokenIssuer;
  sessionStore: SessionStore;
  accountGuard: AccountGuard;
  notificationSender: NotificationSender;
  logger: Logger;
  config: AuthConfig;
};
