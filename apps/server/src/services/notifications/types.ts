/**
 * Notification types
 */

import type { NotificationEvent } from '@reelwatch/shared';

/**
 * A delivery target. `send` rejects on failure; the dispatcher retries.
 */
export interface NotificationHandler {
  readonly name: string;
  send(event: NotificationEvent): Promise<void>;
}
