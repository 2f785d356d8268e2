/**
 * History Writer
 *
 * Turns terminal lifecycle events (stopped, error) into history entries.
 * Writes for the same user and item run one at a time so grouping decisions
 * see each other's results. Storage failures retry forever with backoff;
 * past `alertAfterAttempts` the writer reports itself degraded until the
 * write goes through. Only once a `stopped` session is durable is the
 * reconciler told to let go of it.
 */

import { randomUUID } from 'node:crypto';
import {
  HISTORY_WRITE_CONFIG,
  SESSION_LIMITS,
  type HistoryEntry,
  type LifecycleEvent,
  type Session,
} from '@reelwatch/shared';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { withRetry, type BackoffPolicy } from '../../utils/retry.js';
import { KeyedSerialExecutor } from '../sessions/concurrency.js';
import { createHistoryEntry, mergeHistoryEntry, resolveHistoryEntry } from './grouper.js';
import type { HistoryRepository } from './repository.js';

const log = createLogger('HistoryWriter');

export interface HistoryWriterOptions {
  repository: HistoryRepository;
  mergeGapMs?: number;
  retry?: BackoffPolicy;
  alertAfterAttempts?: number;
  /** Called once the entry for a stopped session is durable */
  onFlushed?: (session: Session) => Promise<void> | void;
  idFactory?: () => string;
  now?: () => Date;
}

export class HistoryWriter {
  private readonly repository: HistoryRepository;
  private readonly executor = new KeyedSerialExecutor();
  private readonly retry: BackoffPolicy;
  private readonly alertAfterAttempts: number;
  private readonly onFlushed?: (session: Session) => Promise<void> | void;
  private readonly idFactory: () => string;
  private readonly now: () => Date;
  private mergeGapMs: number;

  /** Entry and pause time already written per logical session (error then stopped) */
  private readonly written = new Map<string, { entryId: string; pausedMs: number }>();
  private pending = 0;
  private degradedWrites = 0;
  private readonly abortController = new AbortController();

  constructor(options: HistoryWriterOptions) {
    this.repository = options.repository;
    this.mergeGapMs = options.mergeGapMs ?? SESSION_LIMITS.HISTORY_MERGE_GAP_MS;
    this.retry = options.retry ?? {
      initialDelayMs: HISTORY_WRITE_CONFIG.INITIAL_RETRY_DELAY_MS,
      maxDelayMs: HISTORY_WRITE_CONFIG.MAX_RETRY_DELAY_MS,
      multiplier: HISTORY_WRITE_CONFIG.RETRY_MULTIPLIER,
    };
    this.alertAfterAttempts = options.alertAfterAttempts ?? HISTORY_WRITE_CONFIG.ALERT_AFTER_ATTEMPTS;
    this.onFlushed = options.onFlushed;
    this.idFactory = options.idFactory ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  setMergeGap(mergeGapMs: number): void {
    this.mergeGapMs = mergeGapMs;
  }

  /**
   * Reconciler transition listener; ignores non-terminal events
   */
  handle(event: LifecycleEvent): void {
    if (event.toState !== 'stopped' && event.toState !== 'error') return;
    void this.enqueue(event);
  }

  /**
   * Queue a write. Resolves with the stored entry, or null if the writer was
   * closed before storage accepted it. Never rejects.
   */
  async enqueue(event: LifecycleEvent): Promise<HistoryEntry | null> {
    const session = event.sessionSnapshot;
    this.pending++;
    try {
      return await this.executor.run(`${session.userId}:${session.itemId}`, () =>
        this.persist(event)
      );
    } catch (error) {
      log.error('History write abandoned', {
        sessionKey: session.sessionKey,
        error: errorMessage(error),
      });
      return null;
    } finally {
      this.pending--;
    }
  }

  private async persist(event: LifecycleEvent): Promise<HistoryEntry> {
    const session = event.sessionSnapshot;
    const finished = { session, stoppedAt: event.timestamp };
    let alerted = false;

    try {
      const entry = await withRetry(
        async () => {
          const previous = this.written.get(session.id);
          const { mode, existing } = await resolveHistoryEntry(
            this.repository,
            session,
            this.mergeGapMs,
            previous?.entryId ?? null
          );
          const next = existing
            ? mergeHistoryEntry(
                existing,
                finished,
                mode === 'rewrite' ? (previous?.pausedMs ?? 0) : 0,
                this.now()
              )
            : createHistoryEntry(this.idFactory(), finished, this.now());
          return this.repository.upsert(next);
        },
        {
          ...this.retry,
          maxAttempts: Infinity,
          signal: this.abortController.signal,
          onRetry: (error, attempt, delayMs) => {
            if (attempt === this.alertAfterAttempts) {
              alerted = true;
              this.degradedWrites++;
              log.error('History storage is failing; session held in memory until it recovers', {
                sessionKey: session.sessionKey,
                attempts: attempt,
                error: errorMessage(error),
              });
              return;
            }
            log.warn(`History write failed, retrying in ${delayMs}ms`, {
              sessionKey: session.sessionKey,
              attempt,
              error: errorMessage(error),
            });
          },
        }
      );

      if (alerted) log.info('History storage recovered', { sessionKey: session.sessionKey });
      log.debug('History entry written', {
        entryId: entry.id,
        sessionKey: session.sessionKey,
        keys: entry.sessionKeyGroup.length,
      });

      if (event.toState === 'stopped') {
        this.written.delete(session.id);
        await this.notifyFlushed(session);
      } else {
        this.written.set(session.id, { entryId: entry.id, pausedMs: session.pausedDurationMs });
      }
      return entry;
    } finally {
      if (alerted) this.degradedWrites--;
    }
  }

  private async notifyFlushed(session: Session): Promise<void> {
    if (!this.onFlushed) return;
    try {
      await this.onFlushed(session);
    } catch (error) {
      log.error('Flush callback failed', {
        sessionKey: session.sessionKey,
        error: errorMessage(error),
      });
    }
  }

  /** Writes queued or in flight */
  get pendingWrites(): number {
    return this.pending;
  }

  /** True while any write has failed past the alert threshold */
  get storageDegraded(): boolean {
    return this.degradedWrites > 0;
  }

  /** Wait for every queued write to settle */
  async drain(): Promise<void> {
    await this.executor.drain();
  }

  /**
   * Stop retrying; writes still failing are abandoned (their sessions stay
   * flush pending)
   */
  close(): void {
    this.abortController.abort();
  }
}
