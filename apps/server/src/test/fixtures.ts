/**
 * Test fixtures and factory functions for creating test data
 */

import { randomUUID } from 'node:crypto';
import type {
  HistoryEntry,
  LifecycleEvent,
  Observation,
  Session,
  SessionSnapshot,
  SessionState,
} from '@reelwatch/shared';

export const T0 = new Date('2026-03-01T20:00:00.000Z');

/** T0 plus the given number of seconds */
export function at(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

/**
 * Create a snapshot as a connector would report it
 */
export function createMockSnapshot(overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    sessionKey: 'session-1',
    userId: 'user-1',
    userName: 'alice',
    itemId: 'item-42',
    state: 'playing',
    positionMs: 60_000,
    durationMs: 600_000,
    isTranscoding: false,
    transcode: { videoDecision: 'directplay', audioDecision: 'directplay', bitrate: 8000 },
    media: { title: 'Test Movie', type: 'movie', year: 2024 },
    player: { name: 'Living Room TV', deviceId: 'device-1', product: 'Emby Theater' },
    ...overrides,
  };
}

/**
 * Create an observation; the snapshot's key follows the observation's
 */
export function createObservation(
  overrides: Partial<Observation> & { state?: SessionSnapshot['state']; positionMs?: number } = {}
): Observation {
  const { state, positionMs, ...rest } = overrides;
  const sessionKey = rest.sessionKey ?? 'session-1';
  const kind = rest.kind ?? 'update';
  const snapshot =
    'snapshot' in rest
      ? rest.snapshot
      : kind === 'stop' || kind === 'error'
        ? undefined
        : createMockSnapshot({
            sessionKey,
            ...(state && { state }),
            ...(positionMs !== undefined && { positionMs }),
          });

  return {
    sessionKey,
    source: 'poll',
    kind,
    revision: 1,
    observedAt: T0,
    ...rest,
    snapshot,
  };
}

/**
 * Create a live session with sensible defaults
 */
export function createMockSession(overrides: Partial<Session> = {}): Session {
  return {
    id: randomUUID(),
    sessionKey: 'session-1',
    userId: 'user-1',
    userName: 'alice',
    itemId: 'item-42',
    state: 'playing',
    positionMs: 60_000,
    durationMs: 600_000,
    isTranscoding: false,
    transcode: { videoDecision: 'directplay', audioDecision: 'directplay', bitrate: 8000 },
    media: { title: 'Test Movie', type: 'movie', year: 2024 },
    player: { name: 'Living Room TV', deviceId: 'device-1' },
    lastSeenRevision: 1,
    lastSource: 'poll',
    sources: ['poll'],
    startedAt: T0,
    lastSeenAt: T0,
    lastPausedAt: null,
    pausedDurationMs: 0,
    flushPending: false,
    note: null,
    rawPayload: null,
    ...overrides,
  };
}

/**
 * Create a lifecycle event for a session
 */
export function createLifecycleEvent(
  fromState: SessionState,
  toState: SessionState,
  sessionOverrides: Partial<Session> = {},
  overrides: Partial<LifecycleEvent> = {}
): LifecycleEvent {
  const session = createMockSession({ state: toState, ...sessionOverrides });
  return {
    sessionKey: session.sessionKey,
    fromState,
    toState,
    timestamp: session.lastSeenAt,
    source: session.lastSource,
    isFirstObservation: false,
    sessionSnapshot: session,
    ...overrides,
  };
}

/**
 * Create a stored history entry
 */
export function createMockHistoryEntry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    id: randomUUID(),
    sessionKeyGroup: ['session-1'],
    userId: 'user-1',
    userName: 'alice',
    itemId: 'item-42',
    mediaTitle: 'Test Movie',
    mediaType: 'movie',
    startedAt: T0,
    stoppedAt: at(600),
    pausedDurationMs: 0,
    watchedPercent: 10,
    note: null,
    updatedAt: at(600),
    ...overrides,
  };
}
