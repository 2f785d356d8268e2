/**
 * Poller Type Definitions
 */

import type { PipelineStatus, SessionSnapshot } from '@reelwatch/shared';
import type { IMediaServerClient } from '../../services/mediaServer/types.js';
import type { SessionReconciler } from '../../services/sessions/reconciler.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Where producers hand their observations. The reconciler in production,
 * a recording fake in tests.
 */
export type ObservationIntake = Pick<SessionReconciler, 'apply' | 'stopSessionsOnlyFrom'>;

export interface PollerOptions {
  client: Pick<IMediaServerClient, 'listActiveSessions'>;
  intake: ObservationIntake;
  /** Polling interval in milliseconds */
  intervalMs?: number;
  /** Consecutive failed fetches before poll-only sessions are flushed */
  failureThreshold?: number;
  now?: () => Date;
}

export type PollerStatus = PipelineStatus['poller'];

// ============================================================================
// Snapshot diffing
// ============================================================================

/**
 * Keys being tracked, mapped to how many consecutive snapshots missed them
 */
export type MissCounts = Map<string, number>;

export interface SnapshotDiff {
  started: SessionSnapshot[];
  updated: SessionSnapshot[];
  /** Keys that reached the miss threshold in this snapshot */
  vanished: string[];
  /** Tracking state to carry into the next diff */
  tracked: MissCounts;
}
