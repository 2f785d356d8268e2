/**
 * History grouping
 *
 * Decides which history entry a finished session belongs to, and how a
 * session folds into it. Reconnect churn (a player dropping and coming back
 * with a new session key moments later) ends up as one continuous watch.
 */

import type { HistoryEntry, Session } from '@reelwatch/shared';
import { calculateWatchedPercent, shouldGroupWithPrevious } from '../sessions/stateTracker.js';
import type { HistoryRepository } from './repository.js';

export type GroupingMode = 'rewrite' | 'merge' | 'new';

export interface GroupingResult {
  mode: GroupingMode;
  /** Entry the session is folded into; absent for `new` */
  existing: HistoryEntry | null;
}

/**
 * The finished session as it will be recorded
 */
export interface FinishedSession {
  session: Session;
  stoppedAt: Date;
}

/**
 * Find the entry a finished session belongs to:
 * 1. the entry this logical session already wrote (error then stopped)
 * 2. the latest entry for the same user and item that stopped within the gap window
 *    before this session started
 * 3. otherwise a new entry
 *
 * Session keys are not identities: Emby and Jellyfin keep one per client, so
 * a rewatch on the same device hours later reuses the key of an old entry.
 */
export async function resolveHistoryEntry(
  repository: HistoryRepository,
  session: Session,
  mergeGapMs: number,
  writtenEntryId: string | null = null
): Promise<GroupingResult> {
  if (writtenEntryId) {
    const own = await repository.findById(writtenEntryId);
    if (own) return { mode: 'rewrite', existing: own };
  }

  const latest = await repository.findLatestForUserItem(session.userId, session.itemId);
  if (latest && shouldGroupWithPrevious(latest.stoppedAt, session.startedAt, mergeGapMs)) {
    return { mode: 'merge', existing: latest };
  }

  return { mode: 'new', existing: null };
}

export function createHistoryEntry(
  id: string,
  { session, stoppedAt }: FinishedSession,
  now: Date = new Date()
): HistoryEntry {
  return {
    id,
    sessionKeyGroup: [session.sessionKey],
    userId: session.userId,
    userName: session.userName,
    itemId: session.itemId,
    mediaTitle: session.media.title,
    mediaType: session.media.type,
    startedAt: session.startedAt,
    stoppedAt,
    pausedDurationMs: session.pausedDurationMs,
    watchedPercent: calculateWatchedPercent(session.positionMs, session.durationMs),
    note: session.note,
    updatedAt: now,
  };
}

/**
 * Fold a finished session into an existing entry.
 *
 * `previousPausedMs` is the pause time this same logical session already
 * contributed on an earlier write (error then stopped), so it is not counted twice.
 */
export function mergeHistoryEntry(
  entry: HistoryEntry,
  { session, stoppedAt }: FinishedSession,
  previousPausedMs = 0,
  now: Date = new Date()
): HistoryEntry {
  const keys = entry.sessionKeyGroup.includes(session.sessionKey)
    ? entry.sessionKeyGroup
    : [...entry.sessionKeyGroup, session.sessionKey];

  return {
    ...entry,
    sessionKeyGroup: keys,
    userName: session.userName,
    startedAt: session.startedAt < entry.startedAt ? session.startedAt : entry.startedAt,
    stoppedAt: stoppedAt > entry.stoppedAt ? stoppedAt : entry.stoppedAt,
    pausedDurationMs:
      entry.pausedDurationMs + Math.max(0, session.pausedDurationMs - previousPausedMs),
    watchedPercent: Math.max(
      entry.watchedPercent,
      calculateWatchedPercent(session.positionMs, session.durationMs)
    ),
    // The note describes how the watch ended
    note: stoppedAt >= entry.stoppedAt ? session.note : entry.note,
    updatedAt: now,
  };
}
