/**
 * Notification Dispatcher
 *
 * Consumes lifecycle events, maps them to notification actions and delivers
 * each notification to every registered handler. Enqueueing never blocks:
 * when the queue is full the oldest notification is dropped and counted.
 * Notifications are delivered one at a time in emission order; within one
 * notification the handlers run side by side and a failing handler is
 * retried on its own without holding up the others beyond its attempts.
 */

import {
  DISPATCHER_CONFIG,
  SESSION_LIMITS,
  type DispatcherCounters,
  type LifecycleEvent,
  type NotificationEvent,
} from '@reelwatch/shared';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { actionsForTransition } from './actions.js';
import { BoundedQueue } from './boundedQueue.js';
import type { NotificationHandler } from './types.js';

const log = createLogger('Dispatcher');

export interface DispatcherOptions {
  capacity?: number;
  /** Attempts per handler, including the first */
  maxAttempts?: number;
  retryDelayMs?: number;
  watchedThreshold?: number;
  handlers?: NotificationHandler[];
}

export class NotificationDispatcher {
  private readonly queue: BoundedQueue<NotificationEvent>;
  private readonly handlers: NotificationHandler[] = [];
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private watchedThreshold: number;
  private processing: Promise<void> | null = null;
  private readonly abortController = new AbortController();

  private counters = { enqueued: 0, delivered: 0, dropped: 0, failedDeliveries: 0 };

  constructor(options: DispatcherOptions = {}) {
    this.queue = new BoundedQueue(options.capacity ?? DISPATCHER_CONFIG.QUEUE_CAPACITY);
    this.maxAttempts = options.maxAttempts ?? DISPATCHER_CONFIG.MAX_DELIVERY_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? DISPATCHER_CONFIG.RETRY_DELAY_MS;
    this.watchedThreshold = options.watchedThreshold ?? SESSION_LIMITS.WATCH_COMPLETION_THRESHOLD;
    for (const handler of options.handlers ?? []) this.register(handler);
  }

  // ==========================================================================
  // Handlers
  // ==========================================================================

  register(handler: NotificationHandler): void {
    // Avoid duplicates
    if (!this.handlers.find((h) => h.name === handler.name)) {
      this.handlers.push(handler);
    }
  }

  unregister(name: string): void {
    const index = this.handlers.findIndex((h) => h.name === name);
    if (index !== -1) this.handlers.splice(index, 1);
  }

  getHandlers(): string[] {
    return this.handlers.map((h) => h.name);
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  setCapacity(capacity: number): void {
    const dropped = this.queue.resize(capacity);
    if (dropped.length > 0) {
      this.counters.dropped += dropped.length;
      log.warn(`Queue shrunk, dropped ${dropped.length} notification(s)`, { capacity });
    }
  }

  setWatchedThreshold(threshold: number): void {
    this.watchedThreshold = threshold;
  }

  // ==========================================================================
  // Intake
  // ==========================================================================

  /**
   * Reconciler transition listener
   */
  handle(event: LifecycleEvent): void {
    for (const action of actionsForTransition(event, this.watchedThreshold)) {
      this.enqueue({
        action,
        sessionKey: event.sessionKey,
        userId: event.sessionSnapshot.userId,
        itemId: event.sessionSnapshot.itemId,
        timestamp: event.timestamp,
        snapshot: event.sessionSnapshot,
      });
    }
  }

  enqueue(notification: NotificationEvent): void {
    this.counters.enqueued++;
    const dropped = this.queue.push(notification);
    if (dropped) {
      this.counters.dropped++;
      log.warn('Queue full, dropped oldest notification', {
        action: dropped.action,
        sessionKey: dropped.sessionKey,
        capacity: this.queue.capacity,
      });
    }
    this.pump();
  }

  // ==========================================================================
  // Delivery
  // ==========================================================================

  private pump(): void {
    if (this.processing) return;
    this.processing = this.process().finally(() => {
      this.processing = null;
      // Enqueued after the loop saw an empty queue
      if (this.queue.size > 0) this.pump();
    });
  }

  private async process(): Promise<void> {
    // Let the producer finish its burst before the first delivery
    await Promise.resolve();
    for (let next = this.queue.shift(); next; next = this.queue.shift()) {
      await this.deliver(next);
    }
  }

  private async deliver(notification: NotificationEvent): Promise<void> {
    const handlers = [...this.handlers];
    const results = await Promise.allSettled(
      handlers.map((handler) =>
        withRetry(() => handler.send(notification), {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.retryDelayMs,
          maxDelayMs: this.retryDelayMs * 4,
          multiplier: 2,
          signal: this.abortController.signal,
          onRetry: (error, attempt) => {
            log.debug(`${handler.name} delivery failed, retrying`, {
              action: notification.action,
              attempt,
              error: errorMessage(error),
            });
          },
        })
      )
    );

    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        this.counters.delivered++;
        return;
      }
      this.counters.failedDeliveries++;
      log.error(`${handlers[index]?.name ?? 'unknown'} delivery failed`, {
        action: notification.action,
        sessionKey: notification.sessionKey,
        attempts: this.maxAttempts,
        error: errorMessage(result.reason),
      });
    });
  }

  /**
   * Resolve once the queue is empty and nothing is being delivered
   */
  async drain(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  /** Stop retrying failed deliveries (shutdown) */
  close(): void {
    this.abortController.abort();
  }

  getCounters(): DispatcherCounters {
    return { ...this.counters, pending: this.queue.size };
  }
}
