/**
 * Shared Jellyfin/Emby API Response Parser Functions
 *
 * Session, item and identity payloads are identical between the two servers.
 * Each platform parser binds its own stream decision logic and product name.
 */

import type { SessionSnapshot } from '@reelwatch/shared';
import {
  isRecord,
  parseString,
  parseBoolean,
  parseOptionalString,
  parseOptionalNumber,
  getNestedObject,
  parseRecordArray,
} from '../../../utils/parsing.js';
import type { ItemMetadata, ServerIdentity } from '../types.js';
import {
  ticksToMs,
  parseMediaType,
  getBitrate,
  shouldFilterItem,
  type StreamDecisions,
} from './jellyfinEmbyUtils.js';

/**
 * Platform-specific stream decision logic
 */
export type StreamDecisionsFn = (session: Record<string, unknown>) => StreamDecisions;

// ============================================================================
// Session Parsing
// ============================================================================

/**
 * Core session parsing logic shared between Jellyfin and Emby.
 *
 * @returns The snapshot, or null when the session has nothing playing
 *          (idle clients, trailers, theme songs, prerolls)
 */
export function parseSessionCore(
  session: Record<string, unknown>,
  getStreamDecisions: StreamDecisionsFn
): SessionSnapshot | null {
  const nowPlaying = getNestedObject(session, 'NowPlayingItem');
  if (!nowPlaying) return null;
  if (shouldFilterItem(nowPlaying)) return null;

  const playState = getNestedObject(session, 'PlayState');
  const mediaType = parseMediaType(nowPlaying.Type);
  const { videoDecision, audioDecision, isTranscode } = getStreamDecisions(session);

  const snapshot: SessionSnapshot = {
    sessionKey: parseString(session.Id),
    userId: parseString(session.UserId),
    userName: parseString(session.UserName),
    itemId: parseString(nowPlaying.Id),
    state: parseBoolean(playState?.IsPaused) ? 'paused' : 'playing',
    positionMs: ticksToMs(playState?.PositionTicks),
    durationMs: ticksToMs(nowPlaying.RunTimeTicks),
    isTranscoding: isTranscode,
    transcode: {
      videoDecision,
      audioDecision,
      bitrate: getBitrate(session),
    },
    media: {
      title: parseString(nowPlaying.Name),
      type: mediaType,
      year: parseOptionalNumber(nowPlaying.ProductionYear),
    },
    player: {
      name: parseString(session.DeviceName),
      deviceId: parseString(session.DeviceId),
      product: parseOptionalString(session.Client),
    },
    raw: session,
  };

  if (mediaType === 'episode') {
    snapshot.media.showTitle = parseOptionalString(nowPlaying.SeriesName);
    snapshot.media.seasonNumber = parseOptionalNumber(nowPlaying.ParentIndexNumber);
    snapshot.media.episodeNumber = parseOptionalNumber(nowPlaying.IndexNumber);
  }

  return snapshot;
}

/**
 * Parse sessions API response - filters to only sessions with active playback
 */
export function parseSessionsResponse(
  sessions: unknown,
  parseSession: (session: Record<string, unknown>) => SessionSnapshot | null
): SessionSnapshot[] {
  const results: SessionSnapshot[] = [];
  for (const session of parseRecordArray(sessions)) {
    const parsed = parseSession(session);
    if (parsed) results.push(parsed);
  }
  return results;
}

// ============================================================================
// Item & Server Parsing
// ============================================================================

export function parseItem(item: Record<string, unknown>): ItemMetadata {
  const type = parseMediaType(item.Type);
  return {
    itemId: parseString(item.Id),
    title: parseString(item.Name),
    type,
    durationMs: ticksToMs(item.RunTimeTicks),
    year: parseOptionalNumber(item.ProductionYear),
    showTitle: type === 'episode' ? parseOptionalString(item.SeriesName) : undefined,
    seasonNumber: type === 'episode' ? parseOptionalNumber(item.ParentIndexNumber) : undefined,
    episodeNumber: type === 'episode' ? parseOptionalNumber(item.IndexNumber) : undefined,
  };
}

/**
 * Parse /Items?Ids= response ({ Items: [...] })
 */
export function parseItemsResponse(data: unknown): ItemMetadata[] {
  const items = isRecord(data) ? data.Items : undefined;
  return parseRecordArray(items).map(parseItem);
}

/**
 * Parse /System/Info/Public into the server identity
 */
export function parseServerIdentity(data: unknown, defaultProductName: string): ServerIdentity {
  const info: Record<string, unknown> = isRecord(data) ? data : {};
  return {
    machineIdentifier: parseString(info.Id),
    version: parseString(info.Version),
    serverName: parseString(info.ServerName),
    productName: parseString(info.ProductName, defaultProductName),
  };
}
