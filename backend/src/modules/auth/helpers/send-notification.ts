/**
 * src/modules/auth/helpers/send-notification.ts
 *
 * WHY:
 * - Every auth notification is fire-and-report: a failed send is logged and the
 *   flow carries on. One helper so no flow forgets the try/catch.
 */

import { errorMeta, type Logger } from '../../../shared/logger/logger';
import type { Notification, NotificationSender } from '../../../shared/messaging/notification-sender';

export async function sendNotification(
  deps: { notificationSender: NotificationSender; logger: Logger },
  notification: Notification,
  ctx: { flow: string; userId: string },
): Promise<void> {
  try {
    await deps.notificationSender.send(notification);
  } catch (err) {
    deps.logger.error({
      msg: 'auth.notification.failed',
      flow: ctx.flow,
      userId: ctx.userId,
      template: notification.template,
      err: errorMeta(err),
    });
  }
}
