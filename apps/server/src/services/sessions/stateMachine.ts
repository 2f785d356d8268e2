/**
 * Session state machine
 *
 * Legal edges and the conflict rule deciding whether an observation may be
 * applied to the live session it targets.
 */

import {
  SESSION_TRANSITIONS,
  type Observation,
  type ObservationSource,
  type SessionState,
} from '@reelwatch/shared';

export function isLegalTransition(from: SessionState, to: SessionState): boolean {
  return SESSION_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: SessionState): boolean {
  return SESSION_TRANSITIONS[state].length === 0;
}

/**
 * State an observation asks the session to be in
 */
export function targetState(observation: Pick<Observation, 'kind' | 'snapshot'>): SessionState {
  switch (observation.kind) {
    case 'stop':
      return 'stopped';
    case 'error':
      return 'error';
    case 'start':
    case 'update':
      return observation.snapshot?.state ?? 'playing';
  }
}

/**
 * - `accept`: apply state and fields
 * - `position`: equal-revision poll after push with the same state; position only
 * - `stale`: older, or a duplicate of what was already applied
 */
export type ConflictResolution = 'accept' | 'position' | 'stale';

/**
 * Decide between the live session's last applied observation and a new one.
 * Higher revision wins. On a tie push wins for state; a poll tie that agrees
 * with the pushed state only refines position.
 *
 * @example
 * resolveConflict({ lastSeenRevision: 5, lastSource: 'push', state: 'playing' }, { revision: 3, source: 'poll' }, 'paused');
 * // 'stale'
 */
export function resolveConflict(
  current: { lastSeenRevision: number; lastSource: ObservationSource; state: SessionState },
  incoming: { revision: number; source: ObservationSource },
  incomingState: SessionState
): ConflictResolution {
  if (incoming.revision > current.lastSeenRevision) return 'accept';
  if (incoming.revision < current.lastSeenRevision) return 'stale';

  if (incoming.source === 'push' && current.lastSource !== 'push') return 'accept';
  if (incoming.source === 'poll' && current.lastSource === 'push' && incomingState === current.state) {
    return 'position';
  }
  return 'stale';
}
