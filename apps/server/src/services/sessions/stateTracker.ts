/**
 * Session State Tracking
 *
 * Pure functions for pause accumulation, watch completion, staleness and
 * history grouping (resume detection).
 */

import { SESSION_LIMITS, type SessionState } from '@reelwatch/shared';

export interface SessionPauseData {
  lastPausedAt: Date | null;
  pausedDurationMs: number;
}

// ============================================================================
// Pause Tracking
// ============================================================================

/**
 * Calculate pause accumulation when session state changes.
 * Entering `paused` (from any state) starts the clock; leaving it adds the
 * elapsed pause to the total.
 *
 * @example
 * // Resuming playback after 5 minutes paused
 * calculatePauseAccumulation('paused', 'playing', { lastPausedAt: fiveMinutesAgo, pausedDurationMs: 0 }, now);
 * // Returns: { lastPausedAt: null, pausedDurationMs: 300000 }
 */
export function calculatePauseAccumulation(
  previousState: SessionState,
  newState: SessionState,
  existing: SessionPauseData,
  now: Date
): SessionPauseData {
  if (previousState !== 'paused' && newState === 'paused') {
    return { lastPausedAt: now, pausedDurationMs: existing.pausedDurationMs };
  }

  if (previousState === 'paused' && newState !== 'paused') {
    const pausedMs = existing.lastPausedAt
      ? Math.max(0, now.getTime() - existing.lastPausedAt.getTime())
      : 0;
    return { lastPausedAt: null, pausedDurationMs: existing.pausedDurationMs + pausedMs };
  }

  return { lastPausedAt: existing.lastPausedAt, pausedDurationMs: existing.pausedDurationMs };
}

// ============================================================================
// Watch Completion
// ============================================================================

/**
 * Final position as a percentage of duration (0-100, two decimals)
 *
 * @example
 * calculateWatchedPercent(270000, 300000); // 90
 * calculateWatchedPercent(1000, 0);        // 0 (unknown duration)
 */
export function calculateWatchedPercent(positionMs: number, durationMs: number): number {
  if (durationMs <= 0 || positionMs <= 0) return 0;
  const percent = Math.round((positionMs / durationMs) * 10000) / 100;
  return Math.min(100, percent);
}

/**
 * Check if a watched percentage meets the completion threshold (0-1)
 *
 * @example
 * checkWatchCompletion(85);        // true (85% with default threshold)
 * checkWatchCompletion(90, 0.95);  // false
 */
export function checkWatchCompletion(
  watchedPercent: number,
  threshold: number = SESSION_LIMITS.WATCH_COMPLETION_THRESHOLD
): boolean {
  return watchedPercent / 100 >= threshold;
}

// ============================================================================
// Stale Session Detection
// ============================================================================

/**
 * A session is stale when nothing has reported it for longer than the grace period.
 * Exactly at the threshold it is NOT stale yet.
 */
export function isStaleSession(lastSeenAt: Date, graceMs: number, now: Date): boolean {
  return now.getTime() - lastSeenAt.getTime() > graceMs;
}

// ============================================================================
// Session Grouping (Resume Detection)
// ============================================================================

/**
 * Whether a session starting at `startedAt` continues a watch that ended at
 * `previousStoppedAt`. Overlapping sessions (negative gap) always continue.
 *
 * @example
 * shouldGroupWithPrevious(stoppedAt, tenSecondsLater, 30_000);   // true
 * shouldGroupWithPrevious(stoppedAt, fiveMinutesLater, 30_000);  // false
 */
export function shouldGroupWithPrevious(
  previousStoppedAt: Date,
  startedAt: Date,
  gapMs: number
): boolean {
  return startedAt.getTime() - previousStoppedAt.getTime() <= gapMs;
}
