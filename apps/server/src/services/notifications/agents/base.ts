/**
 * Base class for notification agents
 *
 * Provides common formatting helpers and the webhook POST every HTTP agent uses.
 */

import type { NotificationEvent, Session } from '@reelwatch/shared';
import { fetchRaw } from '../../../utils/http.js';
import type { NotificationHandler } from '../types.js';

const WEBHOOK_TIMEOUT_MS = 10_000;

/**
 * Abstract base class that all notification agents should extend.
 */
export abstract class BaseAgent implements NotificationHandler {
  abstract readonly name: string;
  abstract readonly displayName: string;

  abstract send(event: NotificationEvent): Promise<void>;

  /**
   * Format duration in milliseconds to human-readable string
   */
  protected formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);

    if (hours > 0) {
      const remainingMinutes = minutes % 60;
      return `${hours}h ${remainingMinutes}m`;
    }
    if (minutes > 0) {
      const remainingSeconds = seconds % 60;
      return `${minutes}m ${remainingSeconds}s`;
    }
    return `${seconds}s`;
  }

  /**
   * Title and subtitle for the media being played
   */
  protected getMediaDisplay(session: Session): { title: string; subtitle: string | null } {
    const { media } = session;
    if (media.type === 'episode' && media.showTitle) {
      const episodeInfo =
        media.seasonNumber && media.episodeNumber
          ? `S${media.seasonNumber.toString().padStart(2, '0')} E${media.episodeNumber.toString().padStart(2, '0')}`
          : '';
      return {
        title: media.showTitle,
        subtitle: episodeInfo ? `${episodeInfo} · ${media.title}` : media.title,
      };
    }
    return {
      title: media.title,
      subtitle: media.year ? `${media.year}` : null,
    };
  }

  protected getPlaybackType(session: Session): string {
    if (session.isTranscoding) {
      return 'Transcode';
    }
    if (session.transcode.videoDecision === 'copy' || session.transcode.audioDecision === 'copy') {
      return 'Direct Stream';
    }
    return 'Direct Play';
  }

  protected async postJson(url: string, body: unknown): Promise<void> {
    await fetchRaw(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      service: this.displayName,
      timeout: WEBHOOK_TIMEOUT_MS,
      includeBodyInError: true,
    });
  }
}
