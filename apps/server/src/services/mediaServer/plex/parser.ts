/**
 * Plex API Response Parser
 *
 * Pure functions for parsing raw Plex API responses into typed objects.
 * Separated from the client for testability and reuse.
 */

import type { MediaType, SessionSnapshot, ReportedState, StreamDecision } from '@reelwatch/shared';
import {
  isRecord,
  parseString,
  parseNumber,
  parseBoolean,
  parseOptionalString,
  parseOptionalNumber,
  getNestedObject,
  parseRecordArray,
} from '../../../utils/parsing.js';
import type { ItemMetadata, ServerIdentity } from '../types.js';

export const PLEX_PRODUCT_NAME = 'Plex Media Server';

/**
 * A parsed session plus the Session.id Plex needs for termination
 * (NOT the sessionKey)
 */
export interface PlexParsedSession {
  snapshot: SessionSnapshot;
  terminationId: string | undefined;
}

// ============================================================================
// Session Parsing
// ============================================================================

/**
 * Parse Plex media type to unified type
 */
function parseMediaType(item: Record<string, unknown>): MediaType {
  if (parseBoolean(item.live)) return 'live';
  switch (parseString(item.type).toLowerCase()) {
    case 'movie':
      return 'movie';
    case 'episode':
      return 'episode';
    case 'track':
      return 'track';
    case 'photo':
      return 'photo';
    default:
      return 'unknown';
  }
}

/**
 * Parse player state from Plex to unified state
 */
function parsePlaybackState(state: unknown): ReportedState {
  switch (parseString(state, 'playing').toLowerCase()) {
    case 'paused':
      return 'paused';
    case 'buffering':
      return 'buffering';
    default:
      return 'playing';
  }
}

function parseDecision(val: unknown): StreamDecision {
  const decision = parseString(val, 'directplay').toLowerCase();
  if (decision === 'transcode') return 'transcode';
  if (decision === 'copy') return 'copy';
  return 'directplay';
}

/**
 * Parse raw Plex session metadata into a snapshot
 */
export function parseSession(item: Record<string, unknown>): PlexParsedSession {
  const player = getNestedObject(item, 'Player') ?? {};
  const user = getNestedObject(item, 'User') ?? {};
  const session = getNestedObject(item, 'Session');
  const transcodeSession = getNestedObject(item, 'TranscodeSession');
  const [firstMedia] = parseRecordArray(item.Media);

  const mediaType = parseMediaType(item);
  const videoDecision = parseDecision(transcodeSession?.videoDecision);
  const audioDecision = parseDecision(transcodeSession?.audioDecision);

  const snapshot: SessionSnapshot = {
    sessionKey: parseString(item.sessionKey),
    userId: parseString(user.id),
    userName: parseString(user.title),
    itemId: parseString(item.ratingKey),
    state: parsePlaybackState(player.state),
    positionMs: parseNumber(item.viewOffset),
    durationMs: parseNumber(item.duration),
    isTranscoding: videoDecision === 'transcode' || audioDecision === 'transcode',
    transcode: {
      videoDecision,
      audioDecision,
      bitrate: parseNumber(firstMedia?.bitrate),
    },
    media: {
      title: parseString(item.title),
      type: mediaType,
      year: parseOptionalNumber(item.year),
    },
    player: {
      name: parseString(player.title),
      deviceId: parseString(player.machineIdentifier),
      product: parseOptionalString(player.product),
    },
    raw: item,
  };

  if (mediaType === 'episode') {
    snapshot.media.showTitle = parseOptionalString(item.grandparentTitle);
    snapshot.media.seasonNumber = parseOptionalNumber(item.parentIndex);
    snapshot.media.episodeNumber = parseOptionalNumber(item.index);
  }

  return { snapshot, terminationId: parseOptionalString(session?.id) };
}

function metadataList(data: unknown): Record<string, unknown>[] {
  const container = getNestedObject(data, 'MediaContainer');
  return parseRecordArray(container?.Metadata);
}

/**
 * Parse Plex /status/sessions response
 */
export function parseSessionsResponse(data: unknown): PlexParsedSession[] {
  return metadataList(data).map(parseSession);
}

// ============================================================================
// Item & Server Parsing
// ============================================================================

/**
 * Parse /library/metadata/{ratingKey}; undefined when the container is empty
 */
export function parseItemResponse(data: unknown): ItemMetadata | undefined {
  const [item] = metadataList(data);
  if (!item) return undefined;

  const type = parseMediaType(item);
  return {
    itemId: parseString(item.ratingKey),
    title: parseString(item.title),
    type,
    durationMs: parseNumber(item.duration),
    year: parseOptionalNumber(item.year),
    showTitle: type === 'episode' ? parseOptionalString(item.grandparentTitle) : undefined,
    seasonNumber: type === 'episode' ? parseOptionalNumber(item.parentIndex) : undefined,
    episodeNumber: type === 'episode' ? parseOptionalNumber(item.index) : undefined,
  };
}

/**
 * Parse the server root (`/`) MediaContainer
 */
export function parseServerIdentity(data: unknown): ServerIdentity {
  const container = getNestedObject(data, 'MediaContainer');
  const info: Record<string, unknown> = isRecord(container) ? container : {};
  return {
    machineIdentifier: parseString(info.machineIdentifier),
    version: parseString(info.version),
    serverName: parseString(info.friendlyName),
    productName: PLEX_PRODUCT_NAME,
  };
}
