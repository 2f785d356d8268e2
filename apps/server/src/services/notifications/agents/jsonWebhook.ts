/**
 * Generic JSON Webhook Notification Agent
 *
 * POSTs the notification as-is: {action, sessionKey, userId, itemId, timestamp, snapshot}
 */

import type { NotificationEvent } from '@reelwatch/shared';
import { BaseAgent } from './base.js';

export class JsonWebhookAgent extends BaseAgent {
  readonly name = 'json-webhook';
  readonly displayName = 'JSON Webhook';

  constructor(private readonly webhookUrl: string) {
    super();
  }

  async send(event: NotificationEvent): Promise<void> {
    await this.postJson(this.webhookUrl, {
      action: event.action,
      sessionKey: event.sessionKey,
      userId: event.userId,
      itemId: event.itemId,
      timestamp: event.timestamp.toISOString(),
      snapshot: event.snapshot,
    });
  }
}
