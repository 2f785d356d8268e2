/**
 * Poller Utility Functions
 *
 * Pure functions shared by the poller and the push ingestor.
 * These functions have no side effects and are easily testable.
 */

import type { Observation, ObservationSource, SessionSnapshot } from '@reelwatch/shared';
import type { MissCounts, SnapshotDiff } from './types.js';

/**
 * Compare a full session list against the keys seen so far.
 *
 * A tracked key absent from `current` counts one miss; it is reported as
 * vanished (and dropped from tracking) once its misses reach `missThreshold`.
 * A key that reappears resets to zero misses.
 *
 * @example
 * // poller: stop on the second consecutive miss
 * diffSnapshots(tracked, sessions, 2);
 * // push: stop as soon as a list omits the key
 * diffSnapshots(tracked, sessions, 1);
 */
export function diffSnapshots(
  previous: MissCounts,
  current: SessionSnapshot[],
  missThreshold: number
): SnapshotDiff {
  const tracked: MissCounts = new Map();
  const started: SessionSnapshot[] = [];
  const updated: SessionSnapshot[] = [];
  const vanished: string[] = [];

  for (const snapshot of current) {
    // Servers occasionally list a session twice; the first entry wins
    if (tracked.has(snapshot.sessionKey)) continue;
    tracked.set(snapshot.sessionKey, 0);
    if (previous.has(snapshot.sessionKey)) {
      updated.push(snapshot);
    } else {
      started.push(snapshot);
    }
  }

  for (const [sessionKey, misses] of previous) {
    if (tracked.has(sessionKey)) continue;
    const count = misses + 1;
    if (count >= missThreshold) {
      vanished.push(sessionKey);
    } else {
      tracked.set(sessionKey, count);
    }
  }

  return { started, updated, vanished, tracked };
}

/**
 * Turn a diff into observations sharing one revision and timestamp
 */
export function diffToObservations(
  diff: SnapshotDiff,
  source: ObservationSource,
  revision: number,
  observedAt: Date
): Observation[] {
  return [
    ...diff.started.map(
      (snapshot): Observation => ({
        sessionKey: snapshot.sessionKey,
        source,
        kind: 'start',
        revision,
        observedAt,
        snapshot,
      })
    ),
    ...diff.updated.map(
      (snapshot): Observation => ({
        sessionKey: snapshot.sessionKey,
        source,
        kind: 'update',
        revision,
        observedAt,
        snapshot,
      })
    ),
    ...diff.vanished.map(
      (sessionKey): Observation => ({
        sessionKey,
        source,
        kind: 'stop',
        revision,
        observedAt,
      })
    ),
  ];
}
