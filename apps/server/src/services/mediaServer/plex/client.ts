/**
 * Plex Media Server Client
 *
 * Implements IMediaServerClient for Plex servers. Poll-only: Plex has no
 * session push channel we subscribe to here.
 *
 * @example
 * const client = new PlexClient({ url: 'http://plex.local:32400', token: 'test-token' });
 * const sessions = await client.listActiveSessions();
 */

import type { SessionSnapshot } from '@reelwatch/shared';
import { ConnectorError, ValidationError } from '../../../utils/errors.js';
import { fetchJson, fetchRaw, plexHeaders } from '../../../utils/http.js';
import { ConnectorBase } from '../shared/connectorBase.js';
import { DEFAULT_TERMINATE_MESSAGE } from '../shared/baseMediaServerClient.js';
import type {
  IMediaServerClient,
  ItemMetadata,
  MediaServerConfig,
  ServerIdentity,
  SessionCommand,
  SessionCommandOptions,
} from '../types.js';
import { parseItemResponse, parseServerIdentity, parseSessionsResponse } from './parser.js';

export class PlexClient extends ConnectorBase implements IMediaServerClient {
  public readonly serverType = 'plex' as const;

  /**
   * sessionKey -> Session.id, refreshed on every listActiveSessions().
   * The terminate endpoint wants Session.id, not the sessionKey.
   */
  private readonly terminationIds = new Map<string, string>();

  constructor(config: MediaServerConfig) {
    super(config);
  }

  private buildHeaders(): Record<string, string> {
    return plexHeaders(this.token);
  }

  async listActiveSessions(): Promise<SessionSnapshot[]> {
    return this.call('listActiveSessions', async (timeout) => {
      const data = await fetchJson<unknown>(`${this.baseUrl}/status/sessions`, {
        headers: this.buildHeaders(),
        service: 'plex',
        timeout,
      });

      const parsed = parseSessionsResponse(data);
      this.terminationIds.clear();
      for (const { snapshot, terminationId } of parsed) {
        if (terminationId) this.terminationIds.set(snapshot.sessionKey, terminationId);
      }
      return parsed.map(({ snapshot }) => snapshot);
    });
  }

  async getItemMetadata(itemId: string): Promise<ItemMetadata> {
    return this.call('getItemMetadata', async (timeout) => {
      const data = await fetchJson<unknown>(
        `${this.baseUrl}/library/metadata/${encodeURIComponent(itemId)}`,
        { headers: this.buildHeaders(), service: 'plex', timeout }
      );

      const item = parseItemResponse(data);
      if (!item) {
        throw new ConnectorError('plex', 'not_found', `item ${itemId} not found`);
      }
      return item;
    });
  }

  async getServerIdentity(): Promise<ServerIdentity> {
    return this.call('getServerIdentity', async (timeout) => {
      const data = await fetchJson<unknown>(`${this.baseUrl}/`, {
        headers: this.buildHeaders(),
        service: 'plex',
        timeout,
      });
      return parseServerIdentity(data);
    });
  }

  /**
   * Plex only exposes stream termination. `stop` and `terminate` both end the
   * stream; the reason text is shown to the viewer.
   */
  async sendCommand(
    sessionKey: string,
    command: SessionCommand,
    options: SessionCommandOptions = {}
  ): Promise<void> {
    if (command !== 'stop' && command !== 'terminate') {
      throw new ValidationError(`Plex does not support the ${command} command`, [
        { field: 'command', message: 'Only stop and terminate are supported' },
      ]);
    }

    const sessionId = this.terminationIds.get(sessionKey);
    if (!sessionId) {
      throw new ConnectorError('plex', 'not_found', `no active session ${sessionKey}`);
    }

    const params = new URLSearchParams({
      sessionId,
      reason: options.text ?? DEFAULT_TERMINATE_MESSAGE,
    });

    await this.call(`sendCommand:${command}`, async (timeout) => {
      await fetchRaw(`${this.baseUrl}/status/sessions/terminate?${params}`, {
        method: 'POST',
        headers: this.buildHeaders(),
        service: 'plex',
        timeout,
      });
    });
  }
}
