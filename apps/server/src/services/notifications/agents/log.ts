/**
 * Log Notification Agent
 *
 * Writes one structured log line per notification.
 */

import { NOTIFICATION_ACTION_TITLES, type NotificationEvent } from '@reelwatch/shared';
import { createLogger, type Logger } from '../../../utils/logger.js';
import { BaseAgent } from './base.js';

export class LogAgent extends BaseAgent {
  readonly name = 'log';
  readonly displayName = 'Log';

  constructor(private readonly log: Logger = createLogger('Notify')) {
    super();
  }

  async send(event: NotificationEvent): Promise<void> {
    const { title, subtitle } = this.getMediaDisplay(event.snapshot);
    const media = subtitle ? `${title} (${subtitle})` : title;
    this.log.info(`${NOTIFICATION_ACTION_TITLES[event.action]}: ${event.snapshot.userName} - ${media}`, {
      action: event.action,
      sessionKey: event.sessionKey,
      userId: event.userId,
      itemId: event.itemId,
      positionMs: event.snapshot.positionMs,
    });
  }
}
