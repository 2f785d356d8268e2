/**
 * Shared constants for Reelwatch
 */

import type { NotificationAction, SessionState } from './types.js';

// API version
export const API_VERSION = 'v1';
export const API_BASE_PATH = `/api/${API_VERSION}`;

// Polling intervals in milliseconds
export const POLLING_INTERVALS = {
  SESSIONS: 5000,
  // Stale session sweep - how often to look for sessions nobody reports any more
  STALE_SWEEP: 15 * 1000,
} as const;

// Push channel (WebSocket) configuration
export const PUSH_CONFIG = {
  // Reconnection settings
  INITIAL_RETRY_DELAY_MS: 1000,
  MAX_RETRY_DELAY_MS: 60 * 1000,
  RETRY_MULTIPLIER: 2,
  // Emby/Jellyfin push a Sessions message every 1.5s once subscribed,
  // so 30s of silence means the socket is dead
  HEARTBEAT_TIMEOUT_MS: 30 * 1000,
  // Consecutive failed connects before the channel is reported as fallback (poll-only)
  FALLBACK_THRESHOLD: 3,
  // SessionsStart argument: initial delay, interval (ms)
  SESSIONS_SUBSCRIPTION: '0,1500',
} as const;

// Connector (media server API) configuration
export const CONNECTOR_CONFIG = {
  REQUEST_TIMEOUT_MS: 10 * 1000,
  MAX_RETRIES: 3,
  INITIAL_RETRY_DELAY_MS: 500,
  MAX_RETRY_DELAY_MS: 5 * 1000,
  RETRY_MULTIPLIER: 2,
} as const;

// Session limits
export const SESSION_LIMITS = {
  // Watch completion threshold - 85% is industry standard
  WATCH_COMPLETION_THRESHOLD: 0.85,
  // Grace period before a session nobody reports any more is stopped
  STALE_SESSION_GRACE_MS: 60 * 1000,
  // Max gap between one session's stop and the next one's start to merge them into one watch
  HISTORY_MERGE_GAP_MS: 30 * 1000,
  // Consecutive poll failures before poll-only sessions are force-flushed
  POLL_FAILURE_THRESHOLD: 5,
} as const;

// History writer retry settings
export const HISTORY_WRITE_CONFIG = {
  INITIAL_RETRY_DELAY_MS: 1000,
  MAX_RETRY_DELAY_MS: 60 * 1000,
  RETRY_MULTIPLIER: 2,
  // Attempts before storage failure is surfaced to the operator
  ALERT_AFTER_ATTEMPTS: 5,
} as const;

// Notification dispatcher settings
export const DISPATCHER_CONFIG = {
  QUEUE_CAPACITY: 500,
  MAX_DELIVERY_ATTEMPTS: 3,
  RETRY_DELAY_MS: 1000,
} as const;

// Legal state machine edges. stopped is terminal.
export const SESSION_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  starting: ['playing', 'paused', 'buffering', 'error', 'stopped'],
  playing: ['paused', 'buffering', 'error', 'stopped'],
  paused: ['playing', 'buffering', 'error', 'stopped'],
  buffering: ['playing', 'paused', 'error', 'stopped'],
  error: ['stopped'],
  stopped: [],
} as const;

// Notification actions (must match NotificationAction in types.ts)
export const NOTIFICATION_ACTIONS = {
  START: 'on_start',
  PAUSE: 'on_pause',
  RESUME: 'on_resume',
  BUFFER: 'on_buffer',
  STOP: 'on_stop',
  WATCHED: 'on_watched',
  ERROR: 'on_error',
} as const satisfies Record<string, NotificationAction>;

// Human readable action names used by notification agents
export const NOTIFICATION_ACTION_TITLES: Record<NotificationAction, string> = {
  on_start: 'Playback Started',
  on_pause: 'Playback Paused',
  on_resume: 'Playback Resumed',
  on_buffer: 'Playback Buffering',
  on_stop: 'Playback Stopped',
  on_watched: 'Watched',
  on_error: 'Playback Error',
};

// Redis key prefixes
export const REDIS_KEYS = {
  // Hash of sessionKey -> serialized live session
  LIVE_SESSIONS: 'reelwatch:sessions:live',
} as const;
