/**
 * Emby Media Server Client
 *
 * Implements IMediaServerClient (with push channel) for Emby servers.
 */

import type { MediaServerConfig } from '../types.js';
import { BaseMediaServerClient, type MediaServerParsers } from '../shared/baseMediaServerClient.js';
import { parseSessionsResponse, parseServerIdentity } from './parser.js';

/**
 * Emby Media Server client implementation
 *
 * @example
 * const client = new EmbyClient({ url: 'http://emby.local:8096', token: 'xxx' });
 * const sessions = await client.listActiveSessions();
 */
export class EmbyClient extends BaseMediaServerClient {
  public readonly serverType = 'emby' as const;

  protected readonly parsers: MediaServerParsers = {
    parseSessionsResponse,
    parseServerIdentity,
  };

  constructor(config: MediaServerConfig) {
    super(config);
  }
}
