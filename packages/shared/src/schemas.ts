/**
 * Zod validation schemas for observations, pipeline configuration and API requests
 */

import { z } from 'zod';
import {
  DISPATCHER_CONFIG,
  POLLING_INTERVALS,
  PUSH_CONFIG,
  SESSION_LIMITS,
} from './constants.js';

// Common schemas
export const serverTypeSchema = z.enum(['plex', 'jellyfin', 'emby']);

const nonNegative = z.number().finite().min(0);

// ============================================================================
// Observation schemas
// ============================================================================

export const sessionSnapshotSchema = z.object({
  sessionKey: z.string().min(1),
  userId: z.string().min(1),
  userName: z.string(),
  itemId: z.string().min(1),
  state: z.enum(['playing', 'paused', 'buffering']),
  positionMs: nonNegative,
  durationMs: nonNegative,
  isTranscoding: z.boolean(),
  transcode: z.object({
    videoDecision: z.enum(['directplay', 'copy', 'transcode']),
    audioDecision: z.enum(['directplay', 'copy', 'transcode']),
    bitrate: nonNegative,
  }),
  media: z.object({
    title: z.string(),
    type: z.enum(['movie', 'episode', 'track', 'photo', 'live', 'unknown']),
    showTitle: z.string().optional(),
    seasonNumber: z.number().int().optional(),
    episodeNumber: z.number().int().optional(),
    year: z.number().int().optional(),
  }),
  player: z.object({
    name: z.string(),
    deviceId: z.string(),
    product: z.string().optional(),
  }),
  raw: z.unknown().optional(),
});

export const historyNoteSchema = z.enum(['poll_failure', 'playback_error', 'stale', 'shutdown']);

export const observationSchema = z
  .object({
    sessionKey: z.string().min(1),
    source: z.enum(['poll', 'push', 'sweep', 'system']),
    kind: z.enum(['start', 'update', 'stop', 'error']),
    revision: z.number().finite().min(0),
    observedAt: z.date(),
    snapshot: sessionSnapshotSchema.optional(),
    note: historyNoteSchema.optional(),
  })
  .refine((o) => o.kind === 'stop' || o.kind === 'error' || o.snapshot !== undefined, {
    message: 'start and update observations require a snapshot',
    path: ['snapshot'],
  })
  .refine((o) => o.snapshot === undefined || o.snapshot.sessionKey === o.sessionKey, {
    message: 'snapshot sessionKey does not match observation',
    path: ['snapshot', 'sessionKey'],
  });

// Live session mirror entry (session store)
export const liveSessionRecordSchema = z.object({
  sessionId: z.string(),
  sessionKey: z.string(),
  userId: z.string(),
  userName: z.string(),
  itemId: z.string(),
  mediaTitle: z.string(),
  state: z.enum(['starting', 'playing', 'paused', 'buffering', 'stopped', 'error']),
  positionMs: z.number(),
  durationMs: z.number(),
  lastSeenRevision: z.number(),
  startedAt: z.string(),
  lastSeenAt: z.string(),
});

// ============================================================================
// Pipeline configuration
// ============================================================================

const pipelineConfigFields = {
  pollIntervalMs: z.number().int().min(500).max(300000),
  pollFailureThreshold: z.number().int().positive(),
  pushReconnectInitialMs: z.number().int().positive(),
  pushReconnectMaxMs: z.number().int().positive(),
  staleSessionGraceMs: z.number().int().positive(),
  historyMergeGapMs: z.number().int().min(0),
  watchedThreshold: z.number().gt(0).max(1),
  dispatcherQueueCapacity: z.number().int().positive(),
};

export const pipelineConfigSchema = z
  .object(pipelineConfigFields)
  .refine((c) => c.pushReconnectInitialMs <= c.pushReconnectMaxMs, {
    message: 'pushReconnectInitialMs must not exceed pushReconnectMaxMs',
    path: ['pushReconnectInitialMs'],
  });

// Partial update used for hot reload; merged onto the running config and re-validated
export const updatePipelineConfigSchema = z.object(pipelineConfigFields).partial().strict();

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  pollIntervalMs: POLLING_INTERVALS.SESSIONS,
  pollFailureThreshold: SESSION_LIMITS.POLL_FAILURE_THRESHOLD,
  pushReconnectInitialMs: PUSH_CONFIG.INITIAL_RETRY_DELAY_MS,
  pushReconnectMaxMs: PUSH_CONFIG.MAX_RETRY_DELAY_MS,
  staleSessionGraceMs: SESSION_LIMITS.STALE_SESSION_GRACE_MS,
  historyMergeGapMs: SESSION_LIMITS.HISTORY_MERGE_GAP_MS,
  watchedThreshold: SESSION_LIMITS.WATCH_COMPLETION_THRESHOLD,
  dispatcherQueueCapacity: DISPATCHER_CONFIG.QUEUE_CAPACITY,
};

// ============================================================================
// API request schemas
// ============================================================================

export const recentHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).default(20),
});

// Type exports from schemas
export type SessionSnapshotInput = z.infer<typeof sessionSnapshotSchema>;
export type ObservationInput = z.infer<typeof observationSchema>;
export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type UpdatePipelineConfigInput = z.infer<typeof updatePipelineConfigSchema>;
export type LiveSessionRecordInput = z.infer<typeof liveSessionRecordSchema>;
export type RecentHistoryQueryInput = z.infer<typeof recentHistoryQuerySchema>;
