/**
 * @reelwatch/shared - Shared types, schemas, and constants
 */

// Type exports
export type {
  // Server
  ServerType,
  // Session
  SessionState,
  ReportedState,
  MediaType,
  ObservationSource,
  ObservationKind,
  StreamDecision,
  SessionSnapshot,
  Observation,
  Session,
  LiveSessionRecord,
  LifecycleEvent,
  // History
  HistoryNote,
  HistoryEntry,
  // Notifications
  NotificationAction,
  NotificationEvent,
  // Push channel
  PushConnectionState,
  PushConnectionStatus,
  // Pipeline status
  ReconcilerCounters,
  DispatcherCounters,
  PipelineStatus,
  // API
  ApiError,
} from './types.js';

// Schema exports
export {
  serverTypeSchema,
  sessionSnapshotSchema,
  historyNoteSchema,
  observationSchema,
  liveSessionRecordSchema,
  pipelineConfigSchema,
  updatePipelineConfigSchema,
  DEFAULT_PIPELINE_CONFIG,
  recentHistoryQuerySchema,
} from './schemas.js';

// Schema input type exports
export type {
  SessionSnapshotInput,
  ObservationInput,
  LiveSessionRecordInput,
  PipelineConfig,
  UpdatePipelineConfigInput,
  RecentHistoryQueryInput,
} from './schemas.js';

// Constant exports
export {
  API_VERSION,
  API_BASE_PATH,
  POLLING_INTERVALS,
  PUSH_CONFIG,
  CONNECTOR_CONFIG,
  SESSION_LIMITS,
  HISTORY_WRITE_CONFIG,
  DISPATCHER_CONFIG,
  SESSION_TRANSITIONS,
  NOTIFICATION_ACTIONS,
  NOTIFICATION_ACTION_TITLES,
  REDIS_KEYS,
} from './constants.js';
