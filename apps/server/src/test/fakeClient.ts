/**
 * Poll-only media server client backed by an in-memory session list
 */

import { vi } from 'vitest';
import type { ServerType, SessionSnapshot } from '@reelwatch/shared';
import type {
  IMediaServerClient,
  ItemMetadata,
  MediaServerConfig,
  ServerIdentity,
} from '../services/mediaServer/types.js';
import { ConnectorError } from '../utils/errors.js';

export class FakeMediaServerClient implements IMediaServerClient {
  readonly serverType: ServerType = 'emby';
  sessions: SessionSnapshot[] = [];
  isUnauthorized = false;

  readonly listActiveSessions = vi.fn(async (): Promise<SessionSnapshot[]> => {
    if (this.isUnauthorized) {
      throw new ConnectorError(this.serverType, 'unauthorized', 'invalid token');
    }
    return this.sessions.map((session) => structuredClone(session));
  });

  readonly getItemMetadata = vi.fn(async (itemId: string): Promise<ItemMetadata> => ({
    itemId,
    title: 'Test Movie',
    type: 'movie',
    durationMs: 600_000,
  }));

  readonly sendCommand = vi.fn(async (): Promise<void> => undefined);

  readonly getServerIdentity = vi.fn(
    async (): Promise<ServerIdentity> => ({
      machineIdentifier: 'server-1',
      version: '4.8.0',
      serverName: 'Test Server',
      productName: 'Emby Server',
    })
  );

  readonly testConnection = vi.fn(async (): Promise<boolean> => !this.isUnauthorized);

  readonly reconfigure = vi.fn((_config: Partial<MediaServerConfig>): void => {
    this.isUnauthorized = false;
  });
}
