/**
 * Jellyfin Media Server Client
 *
 * Implements IMediaServerClient (with push channel) for Jellyfin servers.
 */

import type { MediaServerConfig } from '../types.js';
import { BaseMediaServerClient, type MediaServerParsers } from '../shared/baseMediaServerClient.js';
import { parseSessionsResponse, parseServerIdentity } from './parser.js';

export class JellyfinClient extends BaseMediaServerClient {
  public readonly serverType = 'jellyfin' as const;

  protected readonly parsers: MediaServerParsers = {
    parseSessionsResponse,
    parseServerIdentity,
  };

  constructor(config: MediaServerConfig) {
    super(config);
  }
}
