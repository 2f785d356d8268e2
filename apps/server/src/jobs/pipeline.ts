/**
 * Monitoring Pipeline
 *
 * Builds and wires the session monitoring components:
 *
 *   connector -> { poller, push ingestor } -> reconciler -> { history writer, dispatcher }
 *
 * and owns their lifecycle: start, the stale-session sweep, configuration
 * hot reload, the status snapshot and an orderly shutdown (stop producers,
 * drain, flush every live session as `shutdown`, drain the dispatcher).
 */

import {
  DEFAULT_PIPELINE_CONFIG,
  POLLING_INTERVALS,
  PUSH_CONFIG,
  pipelineConfigSchema,
  updatePipelineConfigSchema,
  type PipelineConfig,
  type PipelineStatus,
} from '@reelwatch/shared';
import type {
  EventStreamOptions,
  IMediaServerClient,
  MediaServerConfig,
} from '../services/mediaServer/index.js';
import { PushManager } from '../services/pushManager.js';
import { SessionReconciler } from '../services/sessions/reconciler.js';
import type { SessionStore } from '../services/sessions/sessionStore.js';
import { HistoryWriter } from '../services/history/writer.js';
import type { HistoryRepository } from '../services/history/repository.js';
import { NotificationDispatcher } from '../services/notifications/dispatcher.js';
import type { NotificationHandler } from '../services/notifications/types.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { BackoffPolicy } from '../utils/retry.js';
import { Poller } from './poller/index.js';
import { PushIngestor } from './pushIngestor.js';

const log = createLogger('Pipeline');

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

export interface MonitoringPipelineOptions {
  client: IMediaServerClient;
  historyRepository: HistoryRepository;
  config?: PipelineConfig;
  sessionStore?: SessionStore;
  handlers?: NotificationHandler[];
  /** Socket factory and heartbeat tuning for the push channel */
  pushStream?: Omit<EventStreamOptions, 'backoff'>;
  historyRetry?: BackoffPolicy;
  sweepIntervalMs?: number;
  /** Upper bound on each drain step during stop() */
  shutdownTimeoutMs?: number;
  now?: () => Date;
}

function pushBackoff(config: PipelineConfig): BackoffPolicy {
  return {
    initialDelayMs: config.pushReconnectInitialMs,
    maxDelayMs: config.pushReconnectMaxMs,
    multiplier: PUSH_CONFIG.RETRY_MULTIPLIER,
  };
}

/**
 * Resolve true if the promise settles within `ms`, false otherwise
 */
async function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * @example
 * const pipeline = new MonitoringPipeline({ client, historyRepository, handlers });
 * pipeline.start();
 * pipeline.updateConfig({ pollIntervalMs: 10000 });
 * await pipeline.stop();
 */
export class MonitoringPipeline {
  readonly reconciler: SessionReconciler;
  readonly poller: Poller;
  readonly push: PushManager;
  readonly pushIngestor: PushIngestor;
  readonly writer: HistoryWriter;
  readonly dispatcher: NotificationDispatcher;
  readonly historyRepository: HistoryRepository;

  private readonly client: IMediaServerClient;
  private readonly sweepIntervalMs: number;
  private readonly shutdownTimeoutMs: number;
  private config: PipelineConfig;
  private sweepTimer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(options: MonitoringPipelineOptions) {
    this.client = options.client;
    this.historyRepository = options.historyRepository;
    this.config = options.config ?? DEFAULT_PIPELINE_CONFIG;
    this.sweepIntervalMs = options.sweepIntervalMs ?? POLLING_INTERVALS.STALE_SWEEP;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    const config = this.config;

    this.reconciler = new SessionReconciler({
      staleSessionGraceMs: config.staleSessionGraceMs,
      store: options.sessionStore,
      now: options.now,
    });

    this.writer = new HistoryWriter({
      repository: options.historyRepository,
      mergeGapMs: config.historyMergeGapMs,
      retry: options.historyRetry,
      onFlushed: (session) => this.reconciler.completeFlush(session.sessionKey, session.id),
      now: options.now,
    });

    this.dispatcher = new NotificationDispatcher({
      capacity: config.dispatcherQueueCapacity,
      watchedThreshold: config.watchedThreshold,
      handlers: options.handlers,
    });

    this.poller = new Poller({
      client: options.client,
      intake: this.reconciler,
      intervalMs: config.pollIntervalMs,
      failureThreshold: config.pollFailureThreshold,
      now: options.now,
    });

    this.push = new PushManager({
      client: options.client,
      backoff: pushBackoff(config),
      stream: options.pushStream,
    });
    this.pushIngestor = new PushIngestor({
      manager: this.push,
      intake: this.reconciler,
      now: options.now,
    });

    this.reconciler.on('transition', (event) => {
      this.writer.handle(event);
      this.dispatcher.handle(event);
    });

    // Catch up on anything missed while the channel was down
    this.push.on('fallback:deactivated', () => {
      void this.poller.triggerPoll();
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.running) {
      log.debug('Pipeline already running');
      return;
    }
    this.running = true;
    log.info(`Starting monitoring pipeline for ${this.client.serverType}`, {
      handlers: this.dispatcher.getHandlers(),
    });

    this.pushIngestor.start();
    this.push.start();
    this.poller.start();
    this.sweepTimer = setInterval(() => void this.sweep(), this.sweepIntervalMs);
  }

  /**
   * Shut down: stop producers, drain in-flight observations, flush every
   * live session as stopped (`shutdown`), then drain notifications
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    log.info('Stopping monitoring pipeline');

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.poller.stop();
    this.pushIngestor.stop();
    this.push.stop();

    const producersIdle = await settleWithin(
      Promise.all([this.poller.drain(), this.pushIngestor.drain()]),
      this.shutdownTimeoutMs
    );
    if (!producersIdle) log.warn('Gave up waiting for in-flight polls and push events');
    await this.reconciler.drain();

    const stopped = await this.reconciler.stopAll('shutdown');
    log.info(`Flushing ${stopped} live session(s) to history`);

    if (!(await settleWithin(this.writer.drain(), this.shutdownTimeoutMs))) {
      log.warn('History writes still pending at shutdown', {
        pendingWrites: this.writer.pendingWrites,
      });
    }
    this.writer.close();

    if (!(await settleWithin(this.dispatcher.drain(), this.shutdownTimeoutMs))) {
      log.warn('Notifications still queued at shutdown', {
        pending: this.dispatcher.getCounters().pending,
      });
    }
    this.dispatcher.close();
    log.info('Monitoring pipeline stopped');
  }

  /**
   * Wait until observations, history writes and notifications have settled
   */
  async drain(): Promise<void> {
    await this.pushIngestor.drain();
    await this.reconciler.drain();
    await this.writer.drain();
    // flush completions queue behind the writes
    await this.reconciler.drain();
    await this.dispatcher.drain();
  }

  /**
   * Stop sessions nobody has reported within the grace period
   */
  async sweep(): Promise<number> {
    try {
      return await this.reconciler.sweepStale();
    } catch (error) {
      log.error('Stale session sweep failed', { error: errorMessage(error) });
      return 0;
    }
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  getConfig(): PipelineConfig {
    return { ...this.config };
  }

  /**
   * Validate a partial update, merge it onto the running configuration and
   * re-issue it to the running tasks. Throws ValidationError and changes
   * nothing when the update or the merged result is invalid.
   */
  updateConfig(update: unknown): PipelineConfig {
    const parsedUpdate = updatePipelineConfigSchema.safeParse(update);
    if (!parsedUpdate.success) {
      throw ValidationError.fromZodError(parsedUpdate.error);
    }

    const merged = pipelineConfigSchema.safeParse({ ...this.config, ...parsedUpdate.data });
    if (!merged.success) {
      throw ValidationError.fromZodError(merged.error);
    }

    const next = merged.data;
    const previous: Record<string, number> = { ...this.config };
    const changed = Object.entries(next)
      .filter(([key, value]) => previous[key] !== value)
      .map(([key]) => key);
    this.config = next;

    this.poller.setInterval(next.pollIntervalMs);
    this.poller.setFailureThreshold(next.pollFailureThreshold);
    this.push.setBackoff(pushBackoff(next));
    this.reconciler.setGracePeriod(next.staleSessionGraceMs);
    this.writer.setMergeGap(next.historyMergeGapMs);
    this.dispatcher.setCapacity(next.dispatcherQueueCapacity);
    this.dispatcher.setWatchedThreshold(next.watchedThreshold);

    if (changed.length > 0) log.info('Pipeline configuration updated', { changed });
    return { ...next };
  }

  /**
   * New connector URL or credentials; clears a latched unauthorized state
   * and reopens the push channel
   */
  reconfigureConnector(config: Partial<MediaServerConfig>): void {
    this.client.reconfigure(config);
    if (this.push.running) this.push.restart();
    log.info('Connector reconfigured');
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  getStatus(): PipelineStatus {
    return {
      running: this.running,
      serverType: this.client.serverType,
      liveSessions: this.reconciler.size,
      poller: this.poller.getStatus(),
      push: this.push.getStatus(),
      connector: { unauthorized: this.client.isUnauthorized },
      history: {
        pendingWrites: this.writer.pendingWrites,
        storageDegraded: this.writer.storageDegraded,
      },
      reconciler: this.reconciler.getCounters(),
      dispatcher: this.dispatcher.getCounters(),
    };
  }
}
