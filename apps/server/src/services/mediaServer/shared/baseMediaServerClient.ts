/**
 * Base Media Server Client for Jellyfin/Emby
 *
 * Provides shared functionality for both platforms, which have nearly identical APIs.
 * Platform differences (stream decisions, product name) come in through the parsers.
 */

import type { SessionSnapshot } from '@reelwatch/shared';
import { ConnectorError, ValidationError } from '../../../utils/errors.js';
import { fetchJson, fetchRaw, jellyfinEmbyHeaders } from '../../../utils/http.js';
import type {
  IMediaServerClientWithEventStream,
  EventStreamOptions,
  ItemMetadata,
  ServerIdentity,
  SessionCommand,
  SessionCommandOptions,
} from '../types.js';
import { ConnectorBase } from './connectorBase.js';
import { PushEventSource, PUSH_DEVICE_ID } from './eventSource.js';
import { parseItemsResponse } from './jellyfinEmbyParser.js';

// Client identification constants
const CLIENT_NAME = 'Reelwatch';
const CLIENT_VERSION = '0.1.0';
const DEVICE_NAME = 'Reelwatch Server';

export const DEFAULT_TERMINATE_MESSAGE = 'The server owner has ended the stream.';
const DEFAULT_MESSAGE_TIMEOUT_MS = 5000;

/** Commands sent to /Sessions/{id}/Playing/{command} */
const PLAYSTATE_COMMANDS: Partial<Record<SessionCommand, string>> = {
  stop: 'Stop',
  pause: 'Pause',
  unpause: 'Unpause',
  playpause: 'PlayPause',
};

/**
 * Parser functions required by the base client
 */
export interface MediaServerParsers {
  parseSessionsResponse: (data: unknown) => SessionSnapshot[];
  parseServerIdentity: (data: unknown) => ServerIdentity;
}

/**
 * Abstract base client for Jellyfin and Emby media servers
 */
export abstract class BaseMediaServerClient
  extends ConnectorBase
  implements IMediaServerClientWithEventStream
{
  /** Platform identifier for service tagging */
  public abstract readonly serverType: 'jellyfin' | 'emby';

  /** Parser functions injected by subclass */
  protected abstract readonly parsers: MediaServerParsers;

  // ==========================================================================
  // Protected Helpers
  // ==========================================================================

  /**
   * Build X-Emby-Authorization header value
   * Used by both Jellyfin and Emby (identical format)
   */
  protected buildAuthHeader(): string {
    return `MediaBrowser Client="${CLIENT_NAME}", Device="${DEVICE_NAME}", DeviceId="${PUSH_DEVICE_ID}", Version="${CLIENT_VERSION}", Token="${this.token}"`;
  }

  protected buildHeaders(): Record<string, string> {
    return {
      'X-Emby-Authorization': this.buildAuthHeader(),
      ...jellyfinEmbyHeaders(this.token),
    };
  }

  private sessionUrl(sessionKey: string, path: string): string {
    return `${this.baseUrl}/Sessions/${encodeURIComponent(sessionKey)}/${path}`;
  }

  // ==========================================================================
  // IMediaServerClient Implementation
  // ==========================================================================

  /**
   * Get all active playback sessions
   */
  async listActiveSessions(): Promise<SessionSnapshot[]> {
    return this.call('listActiveSessions', async (timeout) => {
      const data = await fetchJson<unknown>(`${this.baseUrl}/Sessions`, {
        headers: this.buildHeaders(),
        service: this.serverType,
        timeout,
      });
      if (!Array.isArray(data)) {
        throw new ConnectorError(this.serverType, 'malformed_response', 'Sessions is not a list');
      }
      return this.parsers.parseSessionsResponse(data);
    });
  }

  async getItemMetadata(itemId: string): Promise<ItemMetadata> {
    return this.call('getItemMetadata', async (timeout) => {
      const params = new URLSearchParams({
        Ids: itemId,
        Fields: 'ProductionYear,ParentIndexNumber,IndexNumber,SeriesName',
      });
      const data = await fetchJson<unknown>(`${this.baseUrl}/Items?${params}`, {
        headers: this.buildHeaders(),
        service: this.serverType,
        timeout,
      });

      const [item] = parseItemsResponse(data);
      if (!item) {
        throw new ConnectorError(this.serverType, 'not_found', `item ${itemId} not found`);
      }
      return item;
    });
  }

  async getServerIdentity(): Promise<ServerIdentity> {
    return this.call('getServerIdentity', async (timeout) => {
      const data = await fetchJson<unknown>(`${this.baseUrl}/System/Info/Public`, {
        headers: { Accept: 'application/json' },
        service: this.serverType,
        timeout,
      });
      return this.parsers.parseServerIdentity(data);
    });
  }

  // ==========================================================================
  // Session Control
  // ==========================================================================

  /**
   * Send a remote control command to a session
   *
   * @example
   * await client.sendCommand(sessionKey, 'pause');
   * await client.sendCommand(sessionKey, 'message', { header: 'Notice', text: 'Server restarting' });
   * await client.sendCommand(sessionKey, 'terminate', { text: 'Too many streams' });
   */
  async sendCommand(
    sessionKey: string,
    command: SessionCommand,
    options: SessionCommandOptions = {}
  ): Promise<void> {
    const playstate = PLAYSTATE_COMMANDS[command];
    if (playstate) {
      await this.post(`sendCommand:${command}`, this.sessionUrl(sessionKey, `Playing/${playstate}`));
      return;
    }

    if (command === 'message') {
      if (!options.text) {
        throw new ValidationError('message command requires text', [
          { field: 'text', message: 'Required' },
        ]);
      }
      await this.sendMessage(sessionKey, options.header ?? CLIENT_NAME, options.text, options.timeoutMs);
      return;
    }

    // terminate: tell the viewer why, then stop playback
    await this.sendMessage(
      sessionKey,
      options.header ?? 'Stream Terminated',
      options.text ?? DEFAULT_TERMINATE_MESSAGE,
      options.timeoutMs
    );
    await this.post('sendCommand:terminate', this.sessionUrl(sessionKey, 'Playing/Stop'));
  }

  private async sendMessage(
    sessionKey: string,
    header: string,
    text: string,
    timeoutMs = DEFAULT_MESSAGE_TIMEOUT_MS
  ): Promise<void> {
    await this.post('sendMessage', this.sessionUrl(sessionKey, 'Message'), {
      Header: header,
      Text: text,
      TimeoutMs: timeoutMs,
    });
  }

  private async post(operation: string, url: string, body?: Record<string, unknown>): Promise<void> {
    await this.call(operation, async (timeout) => {
      await fetchRaw(url, {
        method: 'POST',
        headers: body
          ? { ...this.buildHeaders(), 'Content-Type': 'application/json' }
          : this.buildHeaders(),
        body: body ? JSON.stringify(body) : undefined,
        service: this.serverType,
        timeout,
      });
    });
  }

  // ==========================================================================
  // Push channel
  // ==========================================================================

  openEventStream(options: EventStreamOptions = {}): PushEventSource {
    return new PushEventSource({
      ...options,
      serverType: this.serverType,
      url: this.baseUrl,
      token: this.token,
      parseSessions: (data) => this.parsers.parseSessionsResponse(data),
    });
  }
}
