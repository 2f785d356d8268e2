/**
 * Raw Jellyfin/Emby payload builders shared by parser and client tests
 */

export function buildMovieSession(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    Id: 'session-123',
    UserId: 'user-456',
    UserName: 'alice',
    DeviceName: 'Living Room TV',
    DeviceId: 'device-789',
    Client: 'Web Client',
    NowPlayingItem: {
      Id: 'item-42',
      Name: 'Test Movie',
      Type: 'Movie',
      RunTimeTicks: 72_000_000_000,
      ProductionYear: 2010,
      MediaSources: [{ Bitrate: 8_000_000 }],
    },
    PlayState: {
      PositionTicks: 36_000_000_000,
      IsPaused: false,
      PlayMethod: 'DirectPlay',
    },
    ...overrides,
  };
}

export function buildEpisodeSession(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return buildMovieSession({
    Id: 'session-ep',
    NowPlayingItem: {
      Id: 'item-ep',
      Name: 'Pilot',
      Type: 'Episode',
      SeriesName: 'Test Show',
      ParentIndexNumber: 1,
      IndexNumber: 3,
      RunTimeTicks: 26_000_000_000,
    },
    ...overrides,
  });
}

export function buildIdleSession(): Record<string, unknown> {
  return { Id: 'idle-session', UserId: 'user-456', UserName: 'alice', DeviceName: 'Phone' };
}
