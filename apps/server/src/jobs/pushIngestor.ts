/**
 * Push Event Ingestor
 *
 * Bridges push channel events to the reconciler, in the same observation
 * shape the poller produces (tagged `source=push`).
 *
 * - Sessions list: present keys become `start`/`update`; a key the previous
 *   list had and this one lacks becomes `stop`
 * - PlaybackStopped: `stop` for that key
 */

import type { Observation, SessionSnapshot } from '@reelwatch/shared';
import type { PushManager } from '../services/pushManager.js';
import { RevisionClock } from '../services/sessions/concurrency.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { diffSnapshots, diffToObservations } from './poller/utils.js';
import type { MissCounts, ObservationIntake } from './poller/types.js';

const log = createLogger('PushIngestor');

export interface PushIngestorOptions {
  manager: PushManager;
  intake: ObservationIntake;
  now?: () => Date;
}

export class PushIngestor {
  private readonly manager: PushManager;
  private readonly intake: ObservationIntake;
  private readonly clock: RevisionClock;
  private readonly pending = new Set<Promise<void>>();
  private tracked: MissCounts = new Map();
  private started = false;

  // Stored so they can be removed again
  private readonly handlers = {
    sessions: (sessions: SessionSnapshot[], receivedAt: Date) =>
      this.track(this.ingestSessions(sessions, receivedAt)),
    stopped: (sessionKey: string, receivedAt: Date) =>
      this.track(this.ingestStopped(sessionKey, receivedAt)),
  };

  constructor(options: PushIngestorOptions) {
    this.manager = options.manager;
    this.intake = options.intake;
    const now = options.now ?? (() => new Date());
    this.clock = new RevisionClock(() => now().getTime());
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.manager.on('sessions', this.handlers.sessions);
    this.manager.on('session:stopped', this.handlers.stopped);
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.manager.off('sessions', this.handlers.sessions);
    this.manager.off('session:stopped', this.handlers.stopped);
    this.tracked = new Map();
  }

  /** Wait for every observation handed to the reconciler so far */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async ingestSessions(sessions: SessionSnapshot[], receivedAt: Date): Promise<void> {
    const diff = diffSnapshots(this.tracked, sessions, 1);
    this.tracked = diff.tracked;

    const observations = diffToObservations(diff, 'push', this.clock.next(), receivedAt);
    await Promise.all(observations.map((observation) => this.intake.apply(observation)));
  }

  private async ingestStopped(sessionKey: string, receivedAt: Date): Promise<void> {
    this.tracked.delete(sessionKey);
    const observation: Observation = {
      sessionKey,
      source: 'push',
      kind: 'stop',
      revision: this.clock.next(),
      observedAt: receivedAt,
    };
    await this.intake.apply(observation);
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((error: unknown) => {
        log.error('Failed to apply push event', { error: errorMessage(error) });
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
