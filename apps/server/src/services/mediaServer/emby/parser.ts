/**
 * Emby API Response Parser
 *
 * Pure functions for parsing raw Emby API responses into typed objects.
 * Separated from the client for testability and reuse.
 */

import type { SessionSnapshot } from '@reelwatch/shared';
import { getNestedObject, parseOptionalString } from '../../../utils/parsing.js';
import type { ServerIdentity } from '../types.js';
import {
  parseSessionCore,
  parseSessionsResponse as parseSessionsShared,
  parseServerIdentity as parseServerIdentityShared,
} from '../shared/jellyfinEmbyParser.js';
import {
  DIRECT_PLAY_RESULT,
  getStreamDecisions as getStreamDecisionsShared,
  type StreamDecisions,
} from '../shared/jellyfinEmbyUtils.js';

export const EMBY_PRODUCT_NAME = 'Emby Server';

/**
 * Emby stream decisions.
 * Emby apps report DirectStream even when nothing is remuxed; treat that as
 * DirectPlay when TranscodingInfo is absent or shows both streams are direct.
 */
export function getStreamDecisions(session: Record<string, unknown>): StreamDecisions {
  const playState = getNestedObject(session, 'PlayState');
  const playMethod = parseOptionalString(playState?.PlayMethod)?.toLowerCase();
  const transcodingInfo = getNestedObject(session, 'TranscodingInfo');

  if (playMethod === 'directstream') {
    if (
      !transcodingInfo ||
      (transcodingInfo.IsVideoDirect === true && transcodingInfo.IsAudioDirect === true)
    ) {
      return DIRECT_PLAY_RESULT;
    }
  }

  return getStreamDecisionsShared(session);
}

/**
 * Parse raw Emby session data; null when nothing is playing
 */
export function parseSession(session: Record<string, unknown>): SessionSnapshot | null {
  return parseSessionCore(session, getStreamDecisions);
}

/**
 * Parse Emby sessions API response
 * Filters to only sessions with active playback
 */
export function parseSessionsResponse(sessions: unknown): SessionSnapshot[] {
  return parseSessionsShared(sessions, parseSession);
}

export function parseServerIdentity(data: unknown): ServerIdentity {
  return parseServerIdentityShared(data, EMBY_PRODUCT_NAME);
}
