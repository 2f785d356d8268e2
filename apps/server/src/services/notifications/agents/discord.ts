/**
 * Discord Webhook Notification Agent
 *
 * Sends rich embed messages to Discord webhooks.
 */

import {
  NOTIFICATION_ACTION_TITLES,
  type NotificationAction,
  type NotificationEvent,
} from '@reelwatch/shared';
import { calculateWatchedPercent } from '../../sessions/stateTracker.js';
import { BaseAgent } from './base.js';

interface DiscordField {
  name: string;
  value: string;
  inline?: boolean;
}

interface DiscordEmbed {
  title: string;
  description?: string;
  color: number;
  fields?: DiscordField[];
  timestamp?: string;
}

const ACTION_COLORS: Record<NotificationAction, number> = {
  on_start: 0x2ecc71,
  on_pause: 0xf1c40f,
  on_resume: 0x2ecc71,
  on_buffer: 0xe67e22,
  on_stop: 0x95a5a6,
  on_watched: 0x3498db,
  on_error: 0xe74c3c,
};

export class DiscordAgent extends BaseAgent {
  readonly name = 'discord';
  readonly displayName = 'Discord';

  constructor(private readonly webhookUrl: string) {
    super();
  }

  async send(event: NotificationEvent): Promise<void> {
    await this.postJson(this.webhookUrl, {
      username: 'Reelwatch',
      embeds: [this.buildEmbed(event)],
    });
  }

  buildEmbed(event: NotificationEvent): DiscordEmbed {
    const session = event.snapshot;
    const { title, subtitle } = this.getMediaDisplay(session);

    const fields: DiscordField[] = [
      { name: 'User', value: session.userName || session.userId, inline: true },
      { name: 'Player', value: session.player.product ?? session.player.name, inline: true },
      { name: 'Playback', value: this.getPlaybackType(session), inline: true },
    ];

    if (event.action === 'on_stop' || event.action === 'on_watched') {
      const percent = calculateWatchedPercent(session.positionMs, session.durationMs);
      fields.push({ name: 'Watched', value: `${percent}%`, inline: true });
      if (session.pausedDurationMs > 0) {
        fields.push({
          name: 'Paused',
          value: this.formatDuration(session.pausedDurationMs),
          inline: true,
        });
      }
    }

    return {
      title: `${NOTIFICATION_ACTION_TITLES[event.action]}: ${title}`,
      description: subtitle ?? undefined,
      color: ACTION_COLORS[event.action],
      fields,
      timestamp: event.timestamp.toISOString(),
    };
  }
}
