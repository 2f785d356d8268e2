/**
 * Media Server Client Module
 *
 * Unified interface over Plex, Jellyfin and Emby. Use the factory to create
 * a client from configuration.
 *
 * @example
 * import { createMediaServerClient, supportsEventStream } from './services/mediaServer/index.js';
 *
 * const client = createMediaServerClient({
 *   type: 'emby',
 *   url: 'http://emby.local:8096',
 *   token: 'test-api-key',
 * });
 *
 * const sessions = await client.listActiveSessions();
 * if (supportsEventStream(client)) client.openEventStream().connect();
 */

import { PlexClient } from './plex/client.js';
import { JellyfinClient } from './jellyfin/client.js';
import { EmbyClient } from './emby/client.js';
import type {
  IMediaServerClient,
  IMediaServerClientWithEventStream,
  MediaServerConfig,
  CreateClientOptions,
} from './types.js';

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a media server client for the specified server type
 */
export function createMediaServerClient(options: CreateClientOptions): IMediaServerClient {
  const { type, ...config } = options;
  const clientConfig: MediaServerConfig = config;

  switch (type) {
    case 'plex':
      return new PlexClient(clientConfig);
    case 'jellyfin':
      return new JellyfinClient(clientConfig);
    case 'emby':
      return new EmbyClient(clientConfig);
  }
}

/**
 * Type guard for clients with a real-time push channel (Jellyfin, Emby)
 */
export function supportsEventStream(
  client: IMediaServerClient
): client is IMediaServerClientWithEventStream {
  return 'openEventStream' in client && typeof client.openEventStream === 'function';
}

// ============================================================================
// Re-exports
// ============================================================================

export type {
  IMediaServerClient,
  IMediaServerClientWithEventStream,
  MediaServerConfig,
  CreateClientOptions,
  ItemMetadata,
  ServerIdentity,
  SessionCommand,
  SessionCommandOptions,
  EventStreamOptions,
} from './types.js';

export { PlexClient } from './plex/client.js';
export { JellyfinClient } from './jellyfin/client.js';
export { EmbyClient } from './emby/client.js';
export { PushEventSource, type PushSocketFactory } from './shared/eventSource.js';
