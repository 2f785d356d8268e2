/**
 * Session Poller
 *
 * Fetches the full active-session list on a fixed interval and turns the
 * difference from the previous list into observations:
 * - new key: `start`
 * - key still present: `update`
 * - key missing from two consecutive lists: `stop`
 *
 * A failed fetch is logged and skipped. Only when failures reach the
 * threshold are sessions that nobody but the poller reports stopped with a
 * `poll_failure` note. A tick that fires while the previous one is still in
 * flight is skipped, not queued.
 */

import { POLLING_INTERVALS, SESSION_LIMITS, type SessionSnapshot } from '@reelwatch/shared';
import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { RevisionClock } from '../../services/sessions/concurrency.js';
import type { MissCounts, ObservationIntake, PollerOptions, PollerStatus } from './types.js';
import type { IMediaServerClient } from '../../services/mediaServer/types.js';
import { diffSnapshots, diffToObservations } from './utils.js';

const log = createLogger('Poller');

/** A vanished key is stopped on its second consecutive miss */
export const POLL_MISS_THRESHOLD = 2;

export class Poller {
  private readonly client: Pick<IMediaServerClient, 'listActiveSessions'>;
  private readonly intake: ObservationIntake;
  private readonly now: () => Date;
  private readonly clock: RevisionClock;

  private intervalMs: number;
  private failureThreshold: number;
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;

  private tracked: MissCounts = new Map();
  private consecutiveFailures = 0;
  private failureFlushed = false;
  private lastPollAt: Date | null = null;

  constructor(options: PollerOptions) {
    this.client = options.client;
    this.intake = options.intake;
    this.intervalMs = options.intervalMs ?? POLLING_INTERVALS.SESSIONS;
    this.failureThreshold = options.failureThreshold ?? SESSION_LIMITS.POLL_FAILURE_THRESHOLD;
    this.now = options.now ?? (() => new Date());
    this.clock = new RevisionClock(() => this.now().getTime());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Start polling; the first tick runs immediately
   */
  start(): void {
    if (this.timer) {
      log.debug('Poller already running');
      return;
    }

    log.info(`Starting session poller with ${this.intervalMs}ms interval`);
    this.schedule();
    void this.tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Session poller stopped');
  }

  /**
   * Change the interval; a running poller reschedules without restarting
   */
  setInterval(intervalMs: number): void {
    if (intervalMs === this.intervalMs) return;
    this.intervalMs = intervalMs;
    if (this.timer) {
      clearInterval(this.timer);
      this.schedule();
      log.info(`Poll interval changed to ${intervalMs}ms`);
    }
  }

  setFailureThreshold(threshold: number): void {
    this.failureThreshold = threshold;
  }

  /**
   * Force an immediate poll
   * @returns false when a poll was already in flight and this one was skipped
   */
  async triggerPoll(): Promise<boolean> {
    return this.tick();
  }

  getStatus(): PollerStatus {
    return {
      intervalMs: this.intervalMs,
      consecutiveFailures: this.consecutiveFailures,
      lastPollAt: this.lastPollAt,
      inFlight: this.current !== null,
    };
  }

  /** Wait for the tick in flight, if any */
  async drain(): Promise<void> {
    await this.current;
  }

  // ==========================================================================
  // Tick
  // ==========================================================================

  private schedule(): void {
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
  }

  private async tick(): Promise<boolean> {
    if (this.current) {
      log.debug('Previous poll still in flight, skipping tick');
      return false;
    }

    this.current = this.run();
    try {
      await this.current;
    } finally {
      this.current = null;
    }
    return true;
  }

  private async run(): Promise<void> {
    try {
      await this.poll();
    } catch (error) {
      log.error('Poll tick failed', { error: errorMessage(error) });
    }
  }

  private async poll(): Promise<void> {
    // Stamped before the request: the snapshot describes the server as of now,
    // so a push that lands while the request is in flight outranks it
    const observedAt = this.now();
    const revision = this.clock.next();

    let sessions: SessionSnapshot[];
    try {
      sessions = await this.client.listActiveSessions();
    } catch (error) {
      await this.handleFailure(error);
      return;
    }

    if (this.consecutiveFailures > 0) {
      log.info('Session fetch recovered', { failedTicks: this.consecutiveFailures });
    }
    this.consecutiveFailures = 0;
    this.failureFlushed = false;

    this.lastPollAt = observedAt;

    const diff = diffSnapshots(this.tracked, sessions, POLL_MISS_THRESHOLD);
    this.tracked = diff.tracked;

    const observations = diffToObservations(diff, 'poll', revision, observedAt);
    // Keys are independent; the reconciler serializes per key
    await Promise.all(observations.map((observation) => this.intake.apply(observation)));
  }

  private async handleFailure(error: unknown): Promise<void> {
    this.consecutiveFailures++;
    log.warn('Session fetch failed, skipping tick', {
      error: errorMessage(error),
      consecutiveFailures: this.consecutiveFailures,
    });

    if (this.failureFlushed || this.consecutiveFailures < this.failureThreshold) return;

    // Once per outage; recovering polls report surviving sessions as new
    this.failureFlushed = true;
    this.tracked = new Map();
    const stopped = await this.intake.stopSessionsOnlyFrom('poll', 'poll_failure');
    log.error(
      `Session fetch failed ${this.consecutiveFailures} times in a row, stopped ${stopped} poll-only session(s)`
    );
  }
}
