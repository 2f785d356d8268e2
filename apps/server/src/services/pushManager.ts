/**
 * Push Connection Manager
 *
 * Owns the real-time channel to the media server, when the connector has one.
 * Coordinates between push (real-time) and the poller:
 * - Primary: push events for near-instant session updates
 * - Fallback: while the channel is down the poller alone drives state
 *
 * Loss of the channel is logged once per outage, not once per reconnect attempt.
 */

import { EventEmitter } from 'node:events';
import {
  PUSH_CONFIG,
  type PushConnectionState,
  type PushConnectionStatus,
  type SessionSnapshot,
} from '@reelwatch/shared';
import {
  supportsEventStream,
  type EventStreamOptions,
  type IMediaServerClient,
  type PushEventSource,
} from './mediaServer/index.js';
import type { BackoffPolicy } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('PushManager');

// Events emitted by PushManager for consumers
export type PushManagerEvents = {
  sessions: [sessions: SessionSnapshot[], receivedAt: Date];
  'session:stopped': [sessionKey: string, receivedAt: Date];
  'connection:status': [status: PushConnectionStatus];
  'fallback:activated': [];
  'fallback:deactivated': [];
};

export interface PushManagerOptions {
  client: IMediaServerClient;
  backoff?: BackoffPolicy;
  /** Socket factory, heartbeat and fallback tuning for the event source */
  stream?: Omit<EventStreamOptions, 'backoff'>;
}

/**
 * @example
 * const manager = new PushManager({ client });
 * manager.on('sessions', (sessions, receivedAt) => { ... });
 * manager.on('fallback:activated', () => { ... });
 * manager.start();
 */
export class PushManager extends EventEmitter<PushManagerEvents> {
  private readonly client: IMediaServerClient;
  private readonly stream: Omit<EventStreamOptions, 'backoff'>;
  private backoff: BackoffPolicy;
  private source: PushEventSource | null = null;
  private inOutage = false;
  private inFallback = false;

  constructor(options: PushManagerOptions) {
    super();
    this.client = options.client;
    this.stream = options.stream ?? {};
    this.backoff = options.backoff ?? {
      initialDelayMs: PUSH_CONFIG.INITIAL_RETRY_DELAY_MS,
      maxDelayMs: PUSH_CONFIG.MAX_RETRY_DELAY_MS,
      multiplier: PUSH_CONFIG.RETRY_MULTIPLIER,
    };
  }

  /** Whether the connector has a push channel at all */
  get supported(): boolean {
    return supportsEventStream(this.client);
  }

  get running(): boolean {
    return this.source !== null;
  }

  /**
   * Open the channel. A poll-only connector is a no-op.
   */
  start(): void {
    if (this.source) return;

    if (!supportsEventStream(this.client)) {
      log.info(`${this.client.serverType} has no push channel, polling only`);
      return;
    }

    const source = this.client.openEventStream({ ...this.stream, backoff: this.backoff });
    source.on('sessions', (sessions, receivedAt) => this.emit('sessions', sessions, receivedAt));
    source.on('session:stopped', (sessionKey, receivedAt) =>
      this.emit('session:stopped', sessionKey, receivedAt)
    );
    source.on('connection:state', (state) => this.handleState(state));
    source.on('connection:error', (error) => {
      log.debug('Push socket error', { error: error.message });
    });

    this.source = source;
    log.info(`Opening ${this.client.serverType} push channel`);
    source.connect();
  }

  stop(): void {
    const source = this.source;
    if (!source) return;

    this.source = null;
    source.removeAllListeners();
    source.disconnect();
    this.inOutage = false;
    this.inFallback = false;
    log.info('Push channel closed');
  }

  /**
   * Tear down and reopen, e.g. after the connector was reconfigured
   */
  restart(): void {
    this.stop();
    this.start();
  }

  /**
   * New reconnect bounds; applied from the next reconnect attempt
   */
  setBackoff(backoff: BackoffPolicy): void {
    this.backoff = backoff;
    this.source?.setBackoff(backoff);
  }

  isInFallback(): boolean {
    return this.inFallback;
  }

  getStatus(): PushConnectionStatus | null {
    return this.source?.getStatus() ?? null;
  }

  private handleState(state: PushConnectionState): void {
    const status = this.getStatus();
    if (status) this.emit('connection:status', status);

    if (state === 'connected') {
      if (this.inOutage) log.info('Push channel restored');
      this.inOutage = false;
      if (this.inFallback) {
        this.inFallback = false;
        this.emit('fallback:deactivated');
      }
      return;
    }

    if (state !== 'reconnecting' && state !== 'fallback') return;

    if (!this.inOutage) {
      this.inOutage = true;
      log.warn('Push channel lost, polling alone drives state until it returns', {
        error: status?.error ?? null,
      });
    }
    if (state === 'fallback' && !this.inFallback) {
      this.inFallback = true;
      this.emit('fallback:activated');
    }
  }
}
