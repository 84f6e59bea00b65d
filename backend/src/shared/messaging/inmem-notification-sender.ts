/**
 * src/shared/messaging/inmem-notification-sender.ts
 *
 * WHY:
 * - Tests need to inspect what the service sent without running real email infrastructure.
 * - drain() is the test contract: call it after the request completes, then assert.
 *
 * RULES:
 * - drain() is only used by test helpers; production code never calls it.
 */

import type { Notification, NotificationSender } from './notification-sender';

export class InMemNotificationSender implements NotificationSender {
  private readonly sent: Notification[] = [];

  send(notification: Notification): Promise<void> {
    this.sent.push(notification);
    return Promise.resolve();
  }

  /**
   * Returns all sent notifications and clears the buffer.
   */
  drain(): Notification[] {
    return this.sent.splice(0, this.sent.length);
  }
}
