/**
 * src/shared/messaging/log-notification-sender.ts
 *
 * WHY:
 * - Default production transport until a real mail provider is wired in di.ts.
 * - Records that a notification was dispatched, without its secrets.
 */

import type { Logger } from '../logger/logger';
import type { Notification, NotificationSender } from './notification-sender';

export class LogNotificationSender implements NotificationSender {
  constructor(private readonly logger: Logger) {}

  send(notification: Notification): Promise<void> {
    this.logger.info('notification.dispatched', {
      template: notification.template,
      recipients: notification.to.length,
      subject: notification.subject,
    });
    return Promise.resolve();
  }
}
