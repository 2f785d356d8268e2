/**
 * Core type definitions for Reelwatch
 */

// Server types
export type ServerType = 'plex' | 'jellyfin' | 'emby';

// ============================================================================
// Session Types
// ============================================================================

// Playback state of a tracked session
export type SessionState = 'starting' | 'playing' | 'paused' | 'buffering' | 'stopped' | 'error';

// States a media server can report for an active stream
export type ReportedState = 'playing' | 'paused' | 'buffering';

export type MediaType = 'movie' | 'episode' | 'track' | 'photo' | 'live' | 'unknown';

// Where an observation came from
export type ObservationSource = 'poll' | 'push' | 'sweep' | 'system';

// What the producer believes happened to the session
export type ObservationKind = 'start' | 'update' | 'stop' | 'error';

// Stream decision after normalization (directplay, copy, transcode)
export type StreamDecision = 'directplay' | 'copy' | 'transcode';

// Reason attached to a history entry when a session did not end normally
export type HistoryNote = 'poll_failure' | 'playback_error' | 'stale' | 'shutdown';

/**
 * Canonical snapshot of one active session, as normalized by a connector.
 */
export interface SessionSnapshot {
  sessionKey: string;
  userId: string;
  userName: string;
  itemId: string;
  state: ReportedState;
  positionMs: number;
  durationMs: number;
  isTranscoding: boolean;
  transcode: {
    videoDecision: StreamDecision;
    audioDecision: StreamDecision;
    /** Bitrate in kbps */
    bitrate: number;
  };
  media: {
    title: string;
    type: MediaType;
    showTitle?: string;
    seasonNumber?: number;
    episodeNumber?: number;
    year?: number;
  };
  player: {
    name: string;
    deviceId: string;
    product?: string;
  };
  /** Raw upstream payload, retained for diagnostics */
  raw?: unknown;
}

/**
 * A normalized snapshot/update for one session key from any producer.
 */
export interface Observation {
  sessionKey: string;
  source: ObservationSource;
  kind: ObservationKind;
  /** Monotonic marker used to order observations for the same key */
  revision: number;
  observedAt: Date;
  /** Present for start/update; stop and error observations may omit it */
  snapshot?: SessionSnapshot;
  /** History note for stop/error observations produced by the system */
  note?: HistoryNote;
}

/**
 * Live session as owned by the reconciler
 */
export interface Session {
  /** Logical session id (a session key can be reused after a flush) */
  id: string;
  sessionKey: string;
  userId: string;
  userName: string;
  itemId: string;
  state: SessionState;
  positionMs: number;
  durationMs: number;
  isTranscoding: boolean;
  transcode: SessionSnapshot['transcode'];
  media: SessionSnapshot['media'];
  player: SessionSnapshot['player'];
  lastSeenRevision: number;
  lastSource: ObservationSource;
  /** Producers that have reported this session */
  sources: ObservationSource[];
  startedAt: Date;
  lastSeenAt: Date;
  lastPausedAt: Date | null;
  pausedDurationMs: number;
  /** Terminal state reached, waiting for the history write to complete */
  flushPending: boolean;
  note: HistoryNote | null;
  rawPayload: unknown;
}

/**
 * Flat copy of a live session as mirrored to the session store
 */
export interface LiveSessionRecord {
  sessionId: string;
  sessionKey: string;
  userId: string;
  userName: string;
  itemId: string;
  mediaTitle: string;
  state: SessionState;
  positionMs: number;
  durationMs: number;
  lastSeenRevision: number;
  startedAt: string;
  lastSeenAt: string;
}

/**
 * Transition record passed to the history writer and notification dispatcher
 */
export interface LifecycleEvent {
  sessionKey: string;
  fromState: SessionState;
  toState: SessionState;
  timestamp: Date;
  source: ObservationSource;
  /** True when the transition came from the observation that created the session */
  isFirstObservation: boolean;
  sessionSnapshot: Session;
}

// ============================================================================
// History Types
// ============================================================================

/**
 * Durable record of one continuous watch, possibly merged from several sessions
 */
export interface HistoryEntry {
  id: string;
  sessionKeyGroup: string[];
  userId: string;
  userName: string;
  itemId: string;
  mediaTitle: string;
  mediaType: MediaType;
  startedAt: Date;
  stoppedAt: Date;
  pausedDurationMs: number;
  /** 0-100 */
  watchedPercent: number;
  note: HistoryNote | null;
  updatedAt: Date;
}

// ============================================================================
// Notification Types
// ============================================================================

export type NotificationAction =
  | 'on_start'
  | 'on_pause'
  | 'on_resume'
  | 'on_buffer'
  | 'on_stop'
  | 'on_watched'
  | 'on_error';

/**
 * Event emitted by the dispatcher to every registered handler
 */
export interface NotificationEvent {
  action: NotificationAction;
  sessionKey: string;
  userId: string;
  itemId: string;
  timestamp: Date;
  snapshot: Session;
}

// ============================================================================
// Push Channel Types
// ============================================================================

export type PushConnectionState =
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'disconnected'
  | 'fallback';

export interface PushConnectionStatus {
  state: PushConnectionState;
  connectedAt: Date | null;
  lastEventAt: Date | null;
  reconnectAttempts: number;
  error: string | null;
}

// ============================================================================
// Pipeline Status Types
// ============================================================================

export interface ReconcilerCounters {
  accepted: number;
  touched: number;
  transitions: number;
  malformed: number;
  stale: number;
  illegal: number;
  newLogicalSessions: number;
}

export interface DispatcherCounters {
  enqueued: number;
  delivered: number;
  dropped: number;
  failedDeliveries: number;
  pending: number;
}

export interface PipelineStatus {
  running: boolean;
  serverType: ServerType;
  liveSessions: number;
  poller: {
    intervalMs: number;
    consecutiveFailures: number;
    lastPollAt: Date | null;
    inFlight: boolean;
  };
  push: PushConnectionStatus | null;
  connector: {
    unauthorized: boolean;
  };
  history: {
    pendingWrites: number;
    storageDegraded: boolean;
  };
  reconciler: ReconcilerCounters;
  dispatcher: DispatcherCounters;
}

// API error response
export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
}
