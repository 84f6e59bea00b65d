/**
 * src/shared/messaging/notification-sender.ts
 *
 * WHY:
 * - Decouples "the user must be told" from "here is how emails are sent".
 * - The auth service sends notifications; rendering and delivery are wired at the DI layer only.
 *
 * RULES:
 * - This file depends on nothing else in this codebase (shared → nothing).
 * - Notifications are discriminated unions on the `template` field.
 * - Data must be JSON-serializable.
 * - Raw reset/verification tokens are allowed here; they travel to the renderer so the
 *   link can be built. They are never stored anywhere in raw form.
 * - Never put password hashes, salts, or access/refresh tokens in notifications.
 * - Callers log send() failures and carry on; a notification never blocks a flow.
 */

type NotificationBase = {
  to: string[];
  subject: string;
};

export type VerifyEmailNotification = NotificationBase & {
  template: 'auth.verify-email';
  data: { username: string; verificationToken: string };
};

export type ResetPasswordNotification = NotificationBase & {
  template: 'auth.reset-password';
  data: { username: string; resetToken: string; expiresAt: string };
};

export type PasswordChangedNotification = NotificationBase & {
  template: 'auth.password-changed';
  data: { username: string };
};

export type AccountLockedNotification = NotificationBase & {
  template: 'auth.account-locked';
  data: { username: string; lockedUntil: string };
};

export type Notification =
  | VerifyEmailNotification
  | ResetPasswordNotification
  | PasswordChangedNotification
  | AccountLockedNotification;

export type NotificationTemplate = Notification['template'];

export interface NotificationSender {
  send(notification: Notification): Promise<void>;
}
