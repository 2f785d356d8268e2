/**
 * Shared utilities for Jellyfin and Emby parsers
 *
 * These platforms share nearly identical APIs (Jellyfin is an Emby fork).
 * Common pure functions live here; platform quirks stay in each parser.
 */

import type { MediaType, StreamDecision } from '@reelwatch/shared';
import {
  parseString,
  parseNumber,
  parseOptionalString,
  getNestedObject,
  getNestedValue,
  parseRecordArray,
} from '../../../utils/parsing.js';

// ============================================================================
// Constants
// ============================================================================

/** Jellyfin/Emby ticks per millisecond (10,000 ticks = 1ms) */
export const TICKS_PER_MS = 10000;

/** Item types that should be filtered from session parsing */
export const FILTERED_ITEM_TYPES = new Set(['trailer']);

/** Extra types that should be filtered (theme songs/videos) */
export const FILTERED_EXTRA_TYPES = new Set(['themesong', 'themevideo']);

export interface StreamDecisions {
  videoDecision: StreamDecision;
  audioDecision: StreamDecision;
  isTranscode: boolean;
}

/** Default directplay result when no transcoding detected */
export const DIRECT_PLAY_RESULT: StreamDecisions = {
  videoDecision: 'directplay',
  audioDecision: 'directplay',
  isTranscode: false,
};

// ============================================================================
// Core Utility Functions
// ============================================================================

/**
 * Convert ticks to milliseconds
 *
 * @example
 * ticksToMs(72_000_000_000) // 7_200_000 (2 hours)
 */
export function ticksToMs(ticks: unknown): number {
  return Math.floor(parseNumber(ticks) / TICKS_PER_MS);
}

/**
 * Parse media type to unified type. Live TV channels and programs are `live`
 */
export function parseMediaType(type: unknown): MediaType {
  switch (parseString(type).toLowerCase()) {
    case 'movie':
      return 'movie';
    case 'episode':
      return 'episode';
    case 'audio':
      return 'track';
    case 'livetvchannel':
    case 'tvchannel':
    case 'channel':
    case 'program':
    case 'livetvprogram':
      return 'live';
    case 'photo':
      return 'photo';
    default:
      return 'unknown';
  }
}

/**
 * Get bitrate from session in kbps
 * Both APIs return bitrate in bps
 */
export function getBitrate(session: Record<string, unknown>): number {
  const transcodingInfo = getNestedObject(session, 'TranscodingInfo');
  const transcodeBitrate = parseNumber(transcodingInfo?.Bitrate);
  if (transcodeBitrate > 0) return Math.round(transcodeBitrate / 1000);

  // Fall back to source media bitrate
  const nowPlaying = getNestedObject(session, 'NowPlayingItem');
  const [firstSource] = parseRecordArray(nowPlaying?.MediaSources);
  return Math.round(parseNumber(firstSource?.Bitrate) / 1000);
}

function directFlag(transcodingInfo: Record<string, unknown> | undefined, key: string) {
  const value = getNestedValue(transcodingInfo, key);
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Map PlayMethod (+ TranscodingInfo direct flags) to per-stream decisions.
 *
 * DirectPlay -> directplay, DirectStream -> copy, Transcode -> transcode
 * for every stream the server is not passing through untouched.
 */
export function getStreamDecisions(session: Record<string, unknown>): StreamDecisions {
  const playMethod = parseOptionalString(getNestedValue(session, 'PlayState', 'PlayMethod'));
  const transcodingInfo = getNestedObject(session, 'TranscodingInfo');
  const isVideoDirect = directFlag(transcodingInfo, 'IsVideoDirect');
  const isAudioDirect = directFlag(transcodingInfo, 'IsAudioDirect');

  switch (playMethod?.toLowerCase()) {
    case 'directplay':
      return DIRECT_PLAY_RESULT;
    case 'directstream':
      return {
        videoDecision: 'copy',
        audioDecision: isAudioDirect === false ? 'transcode' : 'copy',
        isTranscode: isAudioDirect === false,
      };
    case 'transcode': {
      const videoDecision: StreamDecision = isVideoDirect ? 'copy' : 'transcode';
      const audioDecision: StreamDecision = isAudioDirect ? 'copy' : 'transcode';
      return {
        videoDecision,
        audioDecision,
        isTranscode: videoDecision === 'transcode' || audioDecision === 'transcode',
      };
    }
    default:
      break;
  }

  // No PlayMethod: only TranscodingInfo tells us anything
  if (transcodingInfo && isVideoDirect !== true) {
    return { videoDecision: 'transcode', audioDecision: 'transcode', isTranscode: true };
  }
  return DIRECT_PLAY_RESULT;
}

/**
 * Check if an item should be filtered (trailers, prerolls, theme songs)
 */
export function shouldFilterItem(nowPlaying: Record<string, unknown>): boolean {
  const itemType = parseString(nowPlaying.Type).toLowerCase();
  const extraType = parseOptionalString(nowPlaying.ExtraType)?.toLowerCase();
  const providerIds = getNestedObject(nowPlaying, 'ProviderIds');

  if (FILTERED_ITEM_TYPES.has(itemType)) return true;
  if (extraType && FILTERED_EXTRA_TYPES.has(extraType)) return true;
  // Preroll videos are identified by the prerolls.video provider
  if (providerIds && 'prerolls.video' in providerIds) return true;

  return false;
}
