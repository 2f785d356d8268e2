/**
 * Jellyfin API Response Parser
 *
 * Pure functions for parsing raw Jellyfin API responses into typed objects.
 */

import type { SessionSnapshot } from '@reelwatch/shared';
import type { ServerIdentity } from '../types.js';
import {
  parseSessionCore,
  parseSessionsResponse as parseSessionsShared,
  parseServerIdentity as parseServerIdentityShared,
} from '../shared/jellyfinEmbyParser.js';
import { getStreamDecisions } from '../shared/jellyfinEmbyUtils.js';

export const JELLYFIN_PRODUCT_NAME = 'Jellyfin Server';

export function parseSession(session: Record<string, unknown>): SessionSnapshot | null {
  return parseSessionCore(session, getStreamDecisions);
}

export function parseSessionsResponse(sessions: unknown): SessionSnapshot[] {
  return parseSessionsShared(sessions, parseSession);
}

export function parseServerIdentity(data: unknown): ServerIdentity {
  return parseServerIdentityShared(data, JELLYFIN_PRODUCT_NAME);
}
