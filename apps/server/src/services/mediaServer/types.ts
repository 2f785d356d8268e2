/**
 * Media Server Integration Types
 *
 * Capability interfaces every upstream connector (Plex, Jellyfin, Emby) implements.
 * The pipeline only ever talks to a connector through these.
 */

import type { MediaType, ServerType, SessionSnapshot } from '@reelwatch/shared';
import type { PushEventSource, PushEventSourceOptions } from './shared/eventSource.js';

// ============================================================================
// DTOs
// ============================================================================

/**
 * Item metadata as returned by getItemMetadata
 */
export interface ItemMetadata {
  itemId: string;
  title: string;
  type: MediaType;
  durationMs: number;
  year?: number;
  showTitle?: string;
  seasonNumber?: number;
  episodeNumber?: number;
}

/**
 * Identity of the upstream server
 */
export interface ServerIdentity {
  machineIdentifier: string;
  version: string;
  serverName: string;
  productName: string;
}

/**
 * Remote control commands. `message` shows text on the client;
 * `terminate` shows a message then stops playback.
 */
export type SessionCommand = 'stop' | 'pause' | 'unpause' | 'playpause' | 'message' | 'terminate';

export interface SessionCommandOptions {
  header?: string;
  text?: string;
  /** How long the client shows the message */
  timeoutMs?: number;
}

// ============================================================================
// Media Server Client Interface
// ============================================================================

/**
 * Configuration for creating a media server client
 */
export interface MediaServerConfig {
  /** Server URL (without trailing slash) */
  url: string;
  /** API key / token */
  token: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Attempts for transient failures (unreachable, timeout), including the first */
  maxAttempts?: number;
  /** First retry delay; doubles on each retry */
  retryDelayMs?: number;
}

/**
 * Common interface for media server clients
 *
 * @example
 * const client = createMediaServerClient({ type: 'emby', url, token });
 * const sessions = await client.listActiveSessions();
 */
export interface IMediaServerClient {
  /** The type of media server this client connects to */
  readonly serverType: ServerType;

  /**
   * Snapshot of every session with an item currently playing
   */
  listActiveSessions(): Promise<SessionSnapshot[]>;

  /**
   * Metadata for one library item; ConnectorError(not_found) if it does not exist
   */
  getItemMetadata(itemId: string): Promise<ItemMetadata>;

  /**
   * Send a remote control command to a session
   */
  sendCommand(
    sessionKey: string,
    command: SessionCommand,
    options?: SessionCommandOptions
  ): Promise<void>;

  /**
   * Identity of the server (public endpoint, no admin rights needed)
   */
  getServerIdentity(): Promise<ServerIdentity>;

  /**
   * Test connection to the server
   * @returns true if connection successful, false otherwise
   */
  testConnection(): Promise<boolean>;

  /**
   * Replace URL/credentials and clear a latched unauthorized state
   */
  reconfigure(config: Partial<MediaServerConfig>): void;

  /** True once the server rejected our credentials; every call fails fast until reconfigure() */
  readonly isUnauthorized: boolean;
}

/**
 * Extended client interface for servers with a real-time push channel.
 * Not all servers expose one (Plex is poll-only here)
 */
export interface IMediaServerClientWithEventStream extends IMediaServerClient {
  /** Create (not connect) an event source bound to this server */
  openEventStream(options?: EventStreamOptions): PushEventSource;
}

/**
 * Tuning for an event stream; URL and credentials come from the client
 */
export type EventStreamOptions = Omit<
  PushEventSourceOptions,
  'serverType' | 'url' | 'token' | 'parseSessions'
>;

// ============================================================================
// Factory Types
// ============================================================================

/**
 * Options for creating a media server client
 */
export interface CreateClientOptions extends MediaServerConfig {
  /** Server type */
  type: ServerType;
}
